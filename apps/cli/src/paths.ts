import { join } from 'node:path';

import { AUTHORIZED_KEYS_FILE, GENERATED_KEY_FILE, PROGRAM_NAME } from '@clipwire/shared-contracts';

export function configDir(home: string): string {
  return join(home, '.config', PROGRAM_NAME);
}

export function authorizedKeysPath(home: string): string {
  return join(configDir(home), AUTHORIZED_KEYS_FILE);
}

export function generatedKeyPath(home: string): string {
  return join(configDir(home), GENERATED_KEY_FILE);
}

/** Private keys tried when no path is given, in order. */
export function defaultKeyCandidates(home: string): string[] {
  return [
    generatedKeyPath(home),
    join(home, '.ssh', 'id_ed25519'),
    join(home, '.ssh', 'id_ecdsa'),
    join(home, '.ssh', 'id_rsa'),
  ];
}
