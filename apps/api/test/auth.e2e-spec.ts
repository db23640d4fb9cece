/**
 * @file auth.e2e-spec.ts
 * @description Signature checks in front of every route
 */
import type { INestApplication } from '@nestjs/common';
import { HEADER_FINGERPRINT, HEADER_SIGNATURE } from '@clipwire/shared-contracts';
import request from 'supertest';

import { createE2eApp, type E2eContext, newIdentity, signedHeaders } from './e2e-helpers';

describe('AuthGuard (e2e)', () => {
  let ctx: E2eContext;
  let app: INestApplication;

  beforeEach(async () => {
    ctx = await createE2eApp();
    app = ctx.app;
  });

  afterEach(async () => {
    await app.close();
  });

  const body = Buffer.from('secret clipboard');

  it('accepts a correctly signed request', async () => {
    await request(app.getHttpServer())
      .post('/copy')
      .set(signedHeaders(ctx.identity, body))
      .set('Content-Type', 'application/octet-stream')
      .send(body)
      .expect(200);

    expect((await ctx.clipboard.paste()).toString()).toBe('secret clipboard');
  });

  it('returns 401 MISSING_AUTH_HEADERS without headers', async () => {
    const res = await request(app.getHttpServer()).get('/paste').expect(401);
    expect(res.body).toEqual({
      error: {
        code: 'MISSING_AUTH_HEADERS',
        message: `Missing ${HEADER_FINGERPRINT} or ${HEADER_SIGNATURE} header`,
      },
    });
  });

  it('returns 401 MISSING_AUTH_HEADERS when only the fingerprint is sent', async () => {
    const res = await request(app.getHttpServer())
      .get('/paste')
      .set(HEADER_FINGERPRINT, ctx.identity.fingerprint())
      .expect(401);
    expect(res.body.error.code).toBe('MISSING_AUTH_HEADERS');
  });

  it('returns 401 UNKNOWN_PUBLIC_KEY for keys outside the trust store', async () => {
    const stranger = newIdentity('stranger');
    const res = await request(app.getHttpServer())
      .post('/copy')
      .set(signedHeaders(stranger, body))
      .set('Content-Type', 'application/octet-stream')
      .send(body)
      .expect(401);

    expect(res.body.error.code).toBe('UNKNOWN_PUBLIC_KEY');
    expect((await ctx.clipboard.paste()).length).toBe(0);
  });

  it('returns 400 INVALID_SIGNATURE_ENCODING for a non-base64 signature', async () => {
    const res = await request(app.getHttpServer())
      .get('/paste')
      .set(HEADER_FINGERPRINT, ctx.identity.fingerprint())
      .set(HEADER_SIGNATURE, '%%%not-base64%%%')
      .expect(400);
    expect(res.body.error.code).toBe('INVALID_SIGNATURE_ENCODING');
  });

  it('returns 400 INVALID_SIGNATURE_FORMAT for base64 that is not an SSH signature', async () => {
    const res = await request(app.getHttpServer())
      .get('/paste')
      .set(HEADER_FINGERPRINT, ctx.identity.fingerprint())
      .set(HEADER_SIGNATURE, Buffer.from('hello').toString('base64'))
      .expect(400);
    expect(res.body.error.code).toBe('INVALID_SIGNATURE_FORMAT');
  });

  it('returns 401 SIGNATURE_VERIFICATION_FAILED when the body was altered', async () => {
    const res = await request(app.getHttpServer())
      .post('/copy')
      .set(signedHeaders(ctx.identity, body))
      .set('Content-Type', 'application/octet-stream')
      .send(Buffer.from('secret clipboarD'))
      .expect(401);

    expect(res.body).toEqual({
      error: { code: 'SIGNATURE_VERIFICATION_FAILED', message: 'Signature verification failed' },
    });
    expect((await ctx.clipboard.paste()).length).toBe(0);
  });

  it('verifies over the raw bytes whatever the content type', async () => {
    const text = Buffer.from('plain text\r\n');
    await request(app.getHttpServer())
      .post('/copy')
      .set(signedHeaders(ctx.identity, text))
      .set('Content-Type', 'text/plain')
      .send(text)
      .expect(200);

    expect((await ctx.clipboard.paste()).equals(text)).toBe(true);
  });
});

describe('AuthGuard with several authorized keys (e2e)', () => {
  it('accepts every valid key and ignores malformed lines', async () => {
    const laptop = newIdentity('laptop');
    const phone = newIdentity('phone');
    const ctx = await createE2eApp({
      identity: laptop,
      authorizedKeys: [laptop.authorizedKey(), 'garbage line', phone.authorizedKey()].join('\n'),
    });

    try {
      await request(ctx.app.getHttpServer()).get('/paste').set(signedHeaders(laptop)).expect(200);
      await request(ctx.app.getHttpServer()).get('/paste').set(signedHeaders(phone)).expect(200);
    } finally {
      await ctx.app.close();
    }
  });
});
