import { parseArgs } from 'node:util';

import { UsageError } from './errors.js';

export const COMMANDS = [
  'server',
  'copy',
  'paste',
  'open',
  'quit',
  'key-gen',
  'key-add',
  'key-print',
  'help',
] as const;

export type CommandName = (typeof COMMANDS)[number];

export type CliFlags = {
  server?: string;
  port?: string;
  key?: string;
  log: boolean;
  fallback: boolean;
  useCliTool: boolean;
  noSizeLimit: boolean;
  help: boolean;
};

export type ParsedCommandLine = {
  command: CommandName;
  args: string[];
  flags: CliFlags;
};

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((name) => name === value);
}

const OPTIONS = {
  server: { type: 'string', short: 's' },
  port: { type: 'string', short: 'p' },
  key: { type: 'string' },
  log: { type: 'boolean', default: false },
  fallback: { type: 'boolean', default: false },
  'use-cli-tool': { type: 'boolean', default: false },
  'no-size-limit': { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

function parseRaw(argv: string[]) {
  try {
    return parseArgs({ args: argv, allowPositionals: true, strict: true, options: OPTIONS });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCommandLine(argv: string[]): ParsedCommandLine {
  const { values, positionals } = parseRaw(argv);
  const flags: CliFlags = {
    server: values.server,
    port: values.port,
    key: values.key,
    log: values.log ?? false,
    fallback: values.fallback ?? false,
    useCliTool: values['use-cli-tool'] ?? false,
    noSizeLimit: values['no-size-limit'] ?? false,
    help: values.help ?? false,
  };

  const [name, ...args] = positionals;
  if (name === undefined || flags.help) {
    return { command: 'help', args: [], flags };
  }
  if (!isCommandName(name)) {
    throw new UsageError(`Unknown command "${name}"`);
  }
  return { command: name, args, flags };
}

export const USAGE = `Usage: clipwire <command> [flags]

Commands:
  server [--fallback] [--use-cli-tool]  serve this machine's clipboard
  copy [data]                           copy data (or stdin) to the server
  paste                                 print the server's clipboard
  open <url>                            open a URL on the server
  quit                                  stop the server
  key-gen                               create a key pair in ~/.config/clipwire
  key-add [key]                         trust a public key (or stdin)
  key-print                             print the public key in use

Flags:
  -s, --server <host>   server address (CLIPWIRE_SERVER, default localhost)
  -p, --port <port>     server port (CLIPWIRE_PORT, default 2850)
      --key <path>      private key (CLIPWIRE_KEY)
      --log             log to stderr
      --no-size-limit   allow copies over 200 MiB
`;
