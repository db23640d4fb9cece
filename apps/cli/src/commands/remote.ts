import { z } from 'zod';

import { UsageError } from '../errors.js';
import { type Command, createClient } from './context.js';

const zOpenUrl = z.string().trim().url();

export const openCommand: Command = async (ctx) => {
  const [raw] = ctx.args;
  if (raw === undefined || ctx.args.length > 1) {
    throw new UsageError('open takes exactly one URL');
  }
  const parsed = zOpenUrl.safeParse(raw);
  if (!parsed.success) {
    throw new UsageError(`Invalid URL "${raw}"`);
  }

  const client = await createClient(ctx);
  await client.open(parsed.data);
};

export const quitCommand: Command = async (ctx) => {
  const client = await createClient(ctx);
  await client.quit();
};
