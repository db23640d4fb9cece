/**
 * @file certificate.ts
 * @description Self-signed TLS certificate kept next to the other config files
 */
import { chmod, mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { isMissingFileError } from '@clipwire/crypto';
import { PROGRAM_NAME, SILENT_LOGGER, type LoggerLike } from '@clipwire/shared-contracts';
import { generate } from 'selfsigned';

export const CERT_FILE = 'cert.pem';
export const KEY_FILE = 'key.pem';

const VALIDITY_DAYS = 3650;

export type TlsMaterial = {
  cert: string;
  key: string;
};

async function readIfPresent(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) return null;
    throw error;
  }
}

/**
 * Loads `cert.pem`/`key.pem` from `dir`, generating an RSA 2048 pair valid for
 * ten years when either is missing.
 */
export async function ensureCertificate(dir: string, logger: LoggerLike = SILENT_LOGGER): Promise<TlsMaterial> {
  const certPath = join(dir, CERT_FILE);
  const keyPath = join(dir, KEY_FILE);
  const [cert, key] = await Promise.all([readIfPresent(certPath), readIfPresent(keyPath)]);
  if (cert && key) return { cert, key };

  logger.log(`Generating self-signed certificate in ${dir}`);
  const pems = generate([{ name: 'commonName', value: PROGRAM_NAME }], {
    days: VALIDITY_DAYS,
    keySize: 2048,
    algorithm: 'sha256',
  });

  await mkdir(dir, { recursive: true, mode: 0o700 });
  await writeFile(keyPath, pems.private, { mode: 0o600 });
  await chmod(keyPath, 0o600);
  await writeFile(certPath, pems.cert, { mode: 0o644 });
  return { cert: pems.cert, key: pems.private };
}
