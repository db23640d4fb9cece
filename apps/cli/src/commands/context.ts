import type { RunServerOptions } from '@clipwire/api';
import type { LoggerLike } from '@clipwire/shared-contracts';

import { SyncClient } from '../client.js';
import { serverBaseUrl, type Settings } from '../config.js';
import { discoverIdentity } from '../key-discovery.js';
import type { Transport } from '../transport.js';

export type OutputStream = { write(chunk: string | Uint8Array): unknown };

export type CliIO = {
  stdin: AsyncIterable<string | Buffer>;
  stdout: OutputStream;
  stderr: OutputStream;
};

/** Clipboard on the machine running the client; used when the server is unreachable. */
export type LocalClipboard = {
  copy(data: Buffer): Promise<void>;
  paste(): Promise<Buffer>;
  stop(): void;
};

export type CliDependencies = {
  env: NodeJS.ProcessEnv;
  home: string;
  /** Where the search for a `.env` file starts; null skips it. */
  cwd: string | null;
  transport: Transport;
  openLocalClipboard: (logger: LoggerLike) => Promise<LocalClipboard>;
  runServer: (options: RunServerOptions) => Promise<unknown>;
};

export type CommandContext = {
  settings: Settings;
  args: string[];
  io: CliIO;
  deps: CliDependencies;
  logger: LoggerLike;
};

export type Command = (ctx: CommandContext) => Promise<void>;

export async function readAll(input: AsyncIterable<string | Buffer>): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks);
}

export async function createClient(ctx: CommandContext): Promise<SyncClient> {
  const identity = await discoverIdentity({
    home: ctx.deps.home,
    explicitPath: ctx.settings.keyPath,
    logger: ctx.logger,
  });
  return new SyncClient({
    baseUrl: serverBaseUrl(ctx.settings),
    identity,
    transport: ctx.deps.transport,
    logger: ctx.logger,
  });
}
