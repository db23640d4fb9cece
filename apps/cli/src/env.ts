import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { isMissingFileError } from '@clipwire/crypto';
import { ENV_KEY, ENV_PORT, ENV_SERVER } from '@clipwire/shared-contracts';

export const ENV_FILE = '.env';

const SETTING_VARIABLES: readonly string[] = [ENV_SERVER, ENV_PORT, ENV_KEY];

export type EnvFile = {
  path: string;
  values: Record<string, string>;
};

function unquote(value: string): string {
  const quote = value.charAt(0);
  if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * The `CLIPWIRE_*` assignments of a `.env` file. Other variables are left
 * to whatever else reads the file.
 */
export function parseEnvFile(contents: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const raw of contents.split(/\r?\n/)) {
    const line = raw.trim().replace(/^export\s+/, '');
    const match = /^([A-Z_]+)\s*=\s*(.*)$/.exec(line);
    if (!match) continue;
    const [, name = '', value = ''] = match;
    if (SETTING_VARIABLES.includes(name)) values[name] = unquote(value);
  }
  return values;
}

/** Nearest `.env` at or above `startDir`, or null. */
export async function readEnvFile(startDir: string): Promise<EnvFile | null> {
  let dir = startDir;
  for (;;) {
    const path = join(dir, ENV_FILE);
    try {
      return { path, values: parseEnvFile(await readFile(path, 'utf8')) };
    } catch (error) {
      if (!isMissingFileError(error)) throw error;
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}
