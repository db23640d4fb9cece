/**
 * @file errors.ts
 * @description Error response schema shared by the server and the client
 */
import { z } from 'zod';

/**
 * All error codes the server can return.
 */
export const ERROR_CODES = [
  'BAD_REQUEST',
  'MISSING_AUTH_HEADERS',
  'UNKNOWN_PUBLIC_KEY',
  'INVALID_SIGNATURE_ENCODING',
  'INVALID_SIGNATURE_FORMAT',
  'SIGNATURE_VERIFICATION_FAILED',
  'CLIPBOARD_UNAVAILABLE',
  'OPEN_URL_FAILED',
  'NOT_FOUND',
  'PAYLOAD_TOO_LARGE',
  'INTERNAL_ERROR',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export const zErrorCode = z.enum(ERROR_CODES);

export const zErrorResponse = z.object({
  error: z.object({
    code: zErrorCode,
    message: z.string(),
    details: z.record(z.unknown()).optional(),
  }),
});

export type ErrorResponse = z.infer<typeof zErrorResponse>;

/**
 * Authentication failures are client errors and are never retried.
 */
export const AUTH_ERROR_CODES = [
  'MISSING_AUTH_HEADERS',
  'UNKNOWN_PUBLIC_KEY',
  'INVALID_SIGNATURE_ENCODING',
  'INVALID_SIGNATURE_FORMAT',
  'SIGNATURE_VERIFICATION_FAILED',
] as const satisfies readonly ErrorCode[];

export type AuthErrorCode = (typeof AUTH_ERROR_CODES)[number];
