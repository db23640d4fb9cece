import { SILENT_LOGGER, type LoggerLike } from '@clipwire/shared-contracts';

import { type CommandLookup, detectClipboardTool, ExternalToolClipboard } from './external-backend.js';
import {
  ClipboardManager,
  DEFAULT_HEALTH_CHECK_INTERVAL_MS,
  DEFAULT_OPERATION_TIMEOUT_MS,
} from './manager.js';
import { NativeClipboard, type TextClipboard } from './native-backend.js';
import { runWithTimeout } from './timeout.js';
import type { ClipboardBackend } from './types.js';

/** `auto` probes backends; the others mirror `--fallback` and `--use-cli-tool`. */
export type ClipboardMode = 'auto' | 'fallback' | 'external';

export type CreateClipboardManagerOptions = {
  mode?: ClipboardMode;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  logger?: LoggerLike;
  operationTimeoutMs?: number;
  healthCheckIntervalMs?: number;
  nativeClipboard?: TextClipboard;
  hasCommand?: CommandLookup;
};

async function probeBackend(
  backend: ClipboardBackend,
  timeoutMs: number,
  logger: LoggerLike,
): Promise<boolean> {
  try {
    await runWithTimeout((signal) => backend.read(signal), timeoutMs, `${backend.kind} probe`);
    return true;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`${backend.kind} clipboard unavailable: ${reason}`);
    return false;
  }
}

/**
 * Picks the primary backend (native clipboard, then an external tool, then
 * none) and wraps it in a ClipboardManager.
 */
export async function createClipboardManager(
  options: CreateClipboardManagerOptions = {},
): Promise<ClipboardManager> {
  const mode = options.mode ?? 'auto';
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const logger = options.logger ?? SILENT_LOGGER;
  const operationTimeoutMs = options.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;

  const managerOptions = {
    operationTimeoutMs,
    healthCheckIntervalMs: options.healthCheckIntervalMs ?? DEFAULT_HEALTH_CHECK_INTERVAL_MS,
    logger,
  };

  if (mode === 'fallback') {
    const manager = new ClipboardManager({ ...managerOptions, primary: null });
    manager.useFallback();
    return manager;
  }

  const tool = await detectClipboardTool({ env, hasCommand: options.hasCommand });
  const external = tool ? new ExternalToolClipboard(tool) : null;
  if (tool) logger.log(`Found clipboard tool ${tool.name}`);

  if (mode === 'external') {
    const manager = new ClipboardManager({ ...managerOptions, primary: null, external });
    manager.useExternalTool();
    return manager;
  }

  let primary: ClipboardBackend | null = null;
  if (platform !== 'android') {
    const native = new NativeClipboard(options.nativeClipboard);
    if (await probeBackend(native, operationTimeoutMs, logger)) primary = native;
  }
  primary ??= external;
  if (!primary) {
    logger.warn('No clipboard backend found; using in-memory clipboard');
  } else {
    logger.log(`Using ${primary.kind} clipboard`);
  }

  return new ClipboardManager({ ...managerOptions, primary, external });
}
