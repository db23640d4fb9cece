import {
  DEFAULT_PORT,
  ENV_KEY,
  ENV_PORT,
  ENV_SERVER,
} from '@clipwire/shared-contracts';
import { z } from 'zod';

import type { CliFlags } from './args.js';
import { UsageError } from './errors.js';

export const zSettings = z
  .object({
    server: z.string().trim().min(1),
    port: z.coerce.number().int().min(0).max(65535),
    keyPath: z.string().min(1).optional(),
    log: z.boolean(),
    fallback: z.boolean(),
    useCliTool: z.boolean(),
    noSizeLimit: z.boolean(),
  })
  .refine((settings) => !(settings.fallback && settings.useCliTool), {
    message: '--fallback and --use-cli-tool cannot be combined',
  });

export type Settings = z.infer<typeof zSettings>;

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}

/**
 * Flags beat environment variables, which beat the `.env` file, which beats
 * the defaults.
 */
export function resolveSettings(
  flags: CliFlags,
  env: NodeJS.ProcessEnv,
  envFile: Record<string, string> = {},
): Settings {
  const lookup = (name: string) => nonEmpty(env[name]) ?? nonEmpty(envFile[name]);
  const parsed = zSettings.safeParse({
    server: nonEmpty(flags.server) ?? lookup(ENV_SERVER) ?? 'localhost',
    port: nonEmpty(flags.port) ?? lookup(ENV_PORT) ?? DEFAULT_PORT,
    keyPath: nonEmpty(flags.key) ?? lookup(ENV_KEY),
    log: flags.log,
    fallback: flags.fallback,
    useCliTool: flags.useCliTool,
    noSizeLimit: flags.noSizeLimit,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new UsageError(`Invalid settings: ${where}${issue?.message ?? 'unknown error'}`);
  }
  return parsed.data;
}

/**
 * `https://<server>:<port>`, or `server` itself when it already names a
 * scheme (its own port wins over `port`).
 */
export function serverBaseUrl(settings: Pick<Settings, 'server' | 'port'>): URL {
  if (/^https?:\/\//i.test(settings.server)) {
    const url = URL.canParse(settings.server) ? new URL(settings.server) : null;
    if (!url) throw new UsageError(`Invalid server address "${settings.server}"`);
    if (!url.port) url.port = String(settings.port);
    return url;
  }
  try {
    return new URL(`https://${settings.server}:${settings.port}/`);
  } catch {
    throw new UsageError(`Invalid server address "${settings.server}"`);
  }
}
