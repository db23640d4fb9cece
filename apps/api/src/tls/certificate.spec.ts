import { X509Certificate } from 'node:crypto';
import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { CERT_FILE, KEY_FILE, ensureCertificate } from './certificate';

describe('ensureCertificate', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'clipwire-tls-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('generates a ten-year self-signed certificate when none exists', async () => {
    const configDir = join(dir, 'config');
    const tls = await ensureCertificate(configDir);

    const cert = new X509Certificate(tls.cert);
    expect(cert.subject).toBe('CN=clipwire');
    const lifetimeDays = (Date.parse(cert.validTo) - Date.parse(cert.validFrom)) / 86_400_000;
    expect(lifetimeDays).toBeGreaterThanOrEqual(3649);
    expect(lifetimeDays).toBeLessThanOrEqual(3651);

    expect(await readFile(join(configDir, CERT_FILE), 'utf8')).toBe(tls.cert);
    expect((await stat(join(configDir, KEY_FILE))).mode & 0o777).toBe(0o600);
  }, 30_000);

  it('reuses an existing pair', async () => {
    await writeFile(join(dir, CERT_FILE), 'existing cert');
    await writeFile(join(dir, KEY_FILE), 'existing key');

    await expect(ensureCertificate(dir)).resolves.toEqual({ cert: 'existing cert', key: 'existing key' });
  });
});
