import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { parseEnvFile, readEnvFile } from './env';

describe('parseEnvFile', () => {
  it('keeps only clipwire settings', () => {
    const contents = [
      '# local overrides',
      'CLIPWIRE_SERVER=desk',
      'export CLIPWIRE_PORT = "9100"',
      "CLIPWIRE_KEY='/keys/id_ed25519'",
      'DATABASE_URL=postgres://localhost',
      'not a line',
    ].join('\r\n');

    expect(parseEnvFile(contents)).toEqual({
      CLIPWIRE_SERVER: 'desk',
      CLIPWIRE_PORT: '9100',
      CLIPWIRE_KEY: '/keys/id_ed25519',
    });
  });
});

describe('readEnvFile', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'clipwire-env-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('finds the nearest .env above the start directory', async () => {
    const nested = join(root, 'a', 'b');
    await mkdir(nested, { recursive: true });
    await writeFile(join(root, '.env'), 'CLIPWIRE_SERVER=outer\n');
    await writeFile(join(root, 'a', '.env'), 'CLIPWIRE_SERVER=inner\n');

    expect(await readEnvFile(nested)).toEqual({
      path: join(root, 'a', '.env'),
      values: { CLIPWIRE_SERVER: 'inner' },
    });
  });
});
