import { MAX_CLIPBOARD_BYTES, PROGRAM_NAME } from '@clipwire/shared-contracts';

import { RequestFailedError } from '../client.js';
import { UsageError } from '../errors.js';
import { TransportError } from '../transport.js';
import { type Command, type CommandContext, createClient, type LocalClipboard, readAll } from './context.js';

function isRemoteFailure(error: unknown): error is RequestFailedError | TransportError {
  return error instanceof RequestFailedError || error instanceof TransportError;
}

async function withLocalClipboard<T>(
  ctx: CommandContext,
  reason: Error,
  fn: (clipboard: LocalClipboard) => Promise<T>,
): Promise<T> {
  ctx.io.stderr.write(`${PROGRAM_NAME}: ${reason.message}; using the local clipboard\n`);
  const clipboard = await ctx.deps.openLocalClipboard(ctx.logger);
  try {
    return await fn(clipboard);
  } finally {
    clipboard.stop();
  }
}

export function assertCopySize(size: number, noSizeLimit: boolean, limit = MAX_CLIPBOARD_BYTES): void {
  if (noSizeLimit || size <= limit) return;
  throw new UsageError(`Refusing to copy ${size} bytes (limit ${limit}); pass --no-size-limit to send anyway`);
}

export const copyCommand: Command = async (ctx) => {
  const data = ctx.args.length > 0 ? Buffer.from(ctx.args.join(' '), 'utf8') : await readAll(ctx.io.stdin);
  assertCopySize(data.length, ctx.settings.noSizeLimit);

  const client = await createClient(ctx);
  try {
    await client.copy(data);
  } catch (error) {
    if (!isRemoteFailure(error)) throw error;
    await withLocalClipboard(ctx, error, (clipboard) => clipboard.copy(data));
  }
};

export const pasteCommand: Command = async (ctx) => {
  const client = await createClient(ctx);
  let data: Buffer;
  try {
    data = await client.paste();
  } catch (error) {
    if (!isRemoteFailure(error)) throw error;
    data = await withLocalClipboard(ctx, error, (clipboard) => clipboard.paste());
  }
  ctx.io.stdout.write(data);
};
