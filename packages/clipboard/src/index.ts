export type { BackendKind, ClipboardBackend, ClipboardState } from './types.js';
export { BackendTimeoutError, BackendUnavailableError } from './errors.js';
export { runWithTimeout } from './timeout.js';
export { InMemoryClipboard } from './memory-backend.js';
export { NativeClipboard, type TextClipboard } from './native-backend.js';
export {
  CLIPBOARD_TOOLS,
  ExternalToolClipboard,
  detectClipboardTool,
  pathLookup,
  runCommand,
  type ClipboardTool,
  type CommandLookup,
  type CommandRunner,
} from './external-backend.js';
export {
  ClipboardManager,
  DEFAULT_HEALTH_CHECK_INTERVAL_MS,
  DEFAULT_OPERATION_TIMEOUT_MS,
  type ClipboardManagerOptions,
} from './manager.js';
export { createClipboardManager, type ClipboardMode, type CreateClipboardManagerOptions } from './factory.js';
