import { access, mkdir, writeFile } from 'node:fs/promises';
import { hostname } from 'node:os';
import { dirname } from 'node:path';

import { appendAuthorizedKey, generateKeyPair } from '@clipwire/crypto';
import { PROGRAM_NAME } from '@clipwire/shared-contracts';

import { UsageError } from '../errors.js';
import { discoverIdentity } from '../key-discovery.js';
import { authorizedKeysPath, generatedKeyPath } from '../paths.js';
import { type Command, readAll } from './context.js';

async function exists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false,
  );
}

export const keyGenCommand: Command = async (ctx) => {
  const privatePath = generatedKeyPath(ctx.deps.home);
  const publicPath = `${privatePath}.pub`;
  for (const path of [privatePath, publicPath]) {
    if (await exists(path)) {
      throw new UsageError(`${path} already exists; refusing to overwrite it`);
    }
  }

  const pair = generateKeyPair(`${PROGRAM_NAME}@${hostname()}`);
  await mkdir(dirname(privatePath), { recursive: true, mode: 0o700 });
  await writeFile(privatePath, pair.privateKey, { mode: 0o600, flag: 'wx' });
  await writeFile(publicPath, `${pair.publicKey.trim()}\n`, { mode: 0o644, flag: 'wx' });

  ctx.io.stderr.write(`Wrote ${privatePath} and ${publicPath}\n`);
  ctx.io.stderr.write(`Run "${PROGRAM_NAME} key-add" with this line on the server:\n`);
  ctx.io.stdout.write(`${pair.publicKey.trim()}\n`);
};

export const keyAddCommand: Command = async (ctx) => {
  const line = ctx.args.length > 0 ? ctx.args.join(' ') : (await readAll(ctx.io.stdin)).toString('utf8');
  if (line.trim().length === 0) {
    throw new UsageError('key-add needs a public key argument or one on stdin');
  }

  const path = authorizedKeysPath(ctx.deps.home);
  const key = await appendAuthorizedKey(path, line);
  ctx.io.stdout.write(`Added ${key.fingerprint} to ${path}\n`);
};

export const keyPrintCommand: Command = async (ctx) => {
  const identity = await discoverIdentity({
    home: ctx.deps.home,
    explicitPath: ctx.settings.keyPath,
    logger: ctx.logger,
  });
  ctx.io.stdout.write(`${identity.authorizedKey()}\n`);
};
