/**
 * @file sync.e2e-spec.ts
 * @description CLI client against a real server on an ephemeral local port
 */
import type { AddressInfo } from 'node:net';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';

import type { INestApplication } from '@nestjs/common';
import { createServerApp } from '@clipwire/api';
import { ClipboardManager } from '@clipwire/clipboard';
import { TrustStore } from '@clipwire/crypto';

import type { CliIO } from '../src/commands/context';
import { runCli } from '../src/main';

const toBuffer = (chunk: string | Uint8Array) => (typeof chunk === 'string' ? Buffer.from(chunk) : Buffer.from(chunk));

function memoryIO() {
  const stdout: Buffer[] = [];
  const stderr: Buffer[] = [];
  const io: CliIO = {
    stdin: Readable.from([]),
    stdout: { write: (chunk: string | Uint8Array) => stdout.push(toBuffer(chunk)) },
    stderr: { write: (chunk: string | Uint8Array) => stderr.push(toBuffer(chunk)) },
  };
  return { io, stdout: () => Buffer.concat(stdout).toString('utf8'), stderr: () => Buffer.concat(stderr).toString('utf8') };
}

describe('clipwire client and server (e2e)', () => {
  let home: string;
  let app: INestApplication;
  let clipboard: ClipboardManager;
  let server: string;
  let opened: string[];
  let terminations: number;

  beforeAll(async () => {
    home = await mkdtemp(join(tmpdir(), 'clipwire-e2e-'));
    const keyGen = memoryIO();
    expect(await runCli(['key-gen'], keyGen.io, { env: {}, home, cwd: null })).toBe(0);

    clipboard = new ClipboardManager({ primary: null });
    opened = [];
    terminations = 0;
    app = await createServerApp(
      {
        clipboard,
        trustStore: TrustStore.fromAuthorizedKeys(keyGen.stdout()),
        openUrl: async (url) => {
          opened.push(url);
        },
        lifecycle: {
          terminate: () => {
            terminations += 1;
          },
        },
      },
      { logger: false },
    );
    await app.listen(0, '127.0.0.1');
    const address: AddressInfo | string | null = app.getHttpServer().address();
    if (address === null || typeof address === 'string') throw new Error('server has no port');
    server = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await app.close();
    await rm(home, { recursive: true, force: true });
  });

  async function cli(...argv: string[]) {
    const run = memoryIO();
    const code = await runCli([...argv, '--server', server], run.io, { env: {}, home, cwd: null });
    return { code, stdout: run.stdout(), stderr: run.stderr() };
  }

  it('copies and pastes through the server', async () => {
    expect((await cli('copy', 'across the wire')).code).toBe(0);
    expect((await clipboard.paste()).toString()).toBe('across the wire');

    const pasted = await cli('paste');
    expect(pasted).toEqual({ code: 0, stdout: 'across the wire', stderr: '' });
  });

  it('opens a URL on the server', async () => {
    expect((await cli('open', 'https://example.com/docs')).code).toBe(0);
    expect(opened).toEqual(['https://example.com/docs']);
  });

  it('is refused with a key the server does not trust', async () => {
    const strangerHome = await mkdtemp(join(tmpdir(), 'clipwire-stranger-'));
    try {
      expect(await runCli(['key-gen'], memoryIO().io, { env: {}, home: strangerHome, cwd: null })).toBe(0);
      const run = memoryIO();
      const code = await runCli(['quit', '--server', server], run.io, { env: {}, home: strangerHome, cwd: null });

      expect(code).toBe(1);
      expect(run.stderr()).toContain('UNKNOWN_PUBLIC_KEY, HTTP 401');
      expect(terminations).toBe(0);
    } finally {
      await rm(strangerHome, { recursive: true, force: true });
    }
  });

  it('asks the server to quit', async () => {
    expect((await cli('quit')).code).toBe(0);
    const deadline = Date.now() + 2000;
    while (terminations === 0 && Date.now() < deadline) {
      await new Promise((resolve) => setTimeout(resolve, 5));
    }
    expect(terminations).toBe(1);
  });
});
