/**
 * @file index.ts
 * @description Shared contracts for the clipboard server and client
 *
 * Naming convention:
 * - zXxx: Zod schema
 * - Xxx: TypeScript type (inferred from schema)
 */

// Errors
export {
  ERROR_CODES,
  AUTH_ERROR_CODES,
  zErrorCode,
  zErrorResponse,
  type AuthErrorCode,
  type ErrorCode,
  type ErrorResponse,
} from './errors.js';

// Wire protocol
export {
  PROGRAM_NAME,
  DEFAULT_PORT,
  ENV_SERVER,
  ENV_PORT,
  ENV_KEY,
  HEADER_FINGERPRINT,
  HEADER_SIGNATURE,
  ROUTES,
  ROUTE_METHODS,
  MAX_CLIPBOARD_BYTES,
  MAX_REQUEST_BODY_BYTES,
  AUTHORIZED_KEYS_FILE,
  GENERATED_KEY_FILE,
  type RouteName,
} from './protocol.js';

// Logging
export { SILENT_LOGGER, type LoggerLike } from './logger.js';
