import type { ClipboardMode } from '@clipwire/clipboard';

import { configDir } from '../paths.js';
import type { Command } from './context.js';

export const serverCommand: Command = async (ctx) => {
  let mode: ClipboardMode = 'auto';
  if (ctx.settings.fallback) mode = 'fallback';
  else if (ctx.settings.useCliTool) mode = 'external';

  await ctx.deps.runServer({
    configDir: configDir(ctx.deps.home),
    port: ctx.settings.port,
    mode,
  });
};
