/**
 * @file protocol.ts
 * @description Wire-level constants shared by the server and the client
 */

export const PROGRAM_NAME = 'clipwire';

export const DEFAULT_PORT = 2850;

export const ENV_SERVER = 'CLIPWIRE_SERVER';
export const ENV_PORT = 'CLIPWIRE_PORT';
export const ENV_KEY = 'CLIPWIRE_KEY';

// Node lowercases incoming header names; the client sends them as written here.
export const HEADER_FINGERPRINT = 'X-Clipwire-Key-Fingerprint';
export const HEADER_SIGNATURE = 'X-Clipwire-Signature';

export const ROUTES = {
  copy: '/copy',
  paste: '/paste',
  open: '/open',
  quit: '/quit',
} as const;

export type RouteName = keyof typeof ROUTES;

export const ROUTE_METHODS: Record<RouteName, 'GET' | 'POST'> = {
  copy: 'POST',
  paste: 'GET',
  open: 'POST',
  quit: 'POST',
};

/** Client-side guard for `copy`; the server enforces its own transport limit. */
export const MAX_CLIPBOARD_BYTES = 200 * 1024 * 1024;

/** Largest request body the server buffers for signature verification. */
export const MAX_REQUEST_BODY_BYTES = 256 * 1024 * 1024;

// Files kept in ~/.config/clipwire on both ends.
export const AUTHORIZED_KEYS_FILE = 'authorized_keys';
export const GENERATED_KEY_FILE = 'id_ed25519';
