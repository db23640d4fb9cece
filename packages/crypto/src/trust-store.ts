import { appendFile, chmod, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { SILENT_LOGGER, type LoggerLike } from '@clipwire/shared-contracts';

import { KeyParseError, isMissingFileError } from './errors.js';
import { parsePublicKey, type PublicKey } from './keys.js';

/**
 * Public keys allowed to talk to the server, indexed by fingerprint.
 * Built once at startup; later edits to the file need a restart.
 */
export class TrustStore {
  private readonly keys = new Map<string, PublicKey>();

  static fromAuthorizedKeys(contents: string, logger: LoggerLike = SILENT_LOGGER): TrustStore {
    const store = new TrustStore();
    contents.split(/\r?\n/).forEach((raw, index) => {
      const line = raw.trim();
      if (line.length === 0 || line.startsWith('#')) return;
      try {
        store.add(parsePublicKey(line));
      } catch (error) {
        if (!(error instanceof KeyParseError)) throw error;
        logger.warn(`Skipping authorized key on line ${index + 1}: ${error.message}`);
      }
    });
    return store;
  }

  static async load(path: string, logger: LoggerLike = SILENT_LOGGER): Promise<TrustStore> {
    let contents: string;
    try {
      contents = await readFile(path, 'utf8');
    } catch (error) {
      if (!isMissingFileError(error)) throw error;
      logger.warn(`No authorized keys at ${path}; add one with "clipwire key-add"`);
      return new TrustStore();
    }
    const store = TrustStore.fromAuthorizedKeys(contents, logger);
    logger.log(`Loaded ${store.size} authorized key(s) from ${path}`);
    return store;
  }

  add(key: PublicKey): void {
    this.keys.set(key.fingerprint, key);
  }

  get(fingerprint: string): PublicKey | undefined {
    return this.keys.get(fingerprint);
  }

  has(fingerprint: string): boolean {
    return this.keys.has(fingerprint);
  }

  get size(): number {
    return this.keys.size;
  }

  fingerprints(): string[] {
    return [...this.keys.keys()];
  }
}

/**
 * Validates `line` and appends it to the authorized_keys file at `path`.
 * Returns the parsed key.
 */
export async function appendAuthorizedKey(path: string, line: string): Promise<PublicKey> {
  const key = parsePublicKey(line);
  await mkdir(dirname(path), { recursive: true, mode: 0o700 });

  let existing = '';
  try {
    existing = await readFile(path, 'utf8');
  } catch (error) {
    if (!isMissingFileError(error)) throw error;
  }
  const separator = existing.length > 0 && !existing.endsWith('\n') ? '\n' : '';
  await appendFile(path, `${separator}${key.toAuthorizedKey()}\n`, { mode: 0o600 });
  await chmod(path, 0o600);
  return key;
}
