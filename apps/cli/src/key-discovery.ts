import { access } from 'node:fs/promises';

import { KeyParseError, SigningIdentity } from '@clipwire/crypto';
import { PROGRAM_NAME, SILENT_LOGGER, type LoggerLike } from '@clipwire/shared-contracts';

import { KeyDiscoveryError } from './errors.js';
import { defaultKeyCandidates } from './paths.js';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export type KeyDiscoveryOptions = {
  home: string;
  /** From `--key` or CLIPWIRE_KEY; when set, nothing else is tried. */
  explicitPath?: string;
  logger?: LoggerLike;
};

/**
 * Loads the signing key: the explicit path if one is given, otherwise the
 * first default location holding a key that parses.
 */
export async function discoverIdentity(options: KeyDiscoveryOptions): Promise<SigningIdentity> {
  const logger = options.logger ?? SILENT_LOGGER;

  if (options.explicitPath) {
    if (!(await exists(options.explicitPath))) {
      throw new KeyDiscoveryError(`Private key ${options.explicitPath} does not exist`);
    }
    return SigningIdentity.fromFile(options.explicitPath);
  }

  for (const candidate of defaultKeyCandidates(options.home)) {
    if (!(await exists(candidate))) continue;
    try {
      const identity = await SigningIdentity.fromFile(candidate);
      logger.log(`Using key ${candidate} (${identity.fingerprint()})`);
      return identity;
    } catch (error) {
      if (!(error instanceof KeyParseError)) throw error;
      logger.warn(`Skipping ${candidate}: ${error.message}`);
    }
  }

  throw new KeyDiscoveryError(
    `No usable private key found; run "${PROGRAM_NAME} key-gen" or pass --key <path>`,
  );
}
