/**
 * @file raw-body.middleware.ts
 * @description Buffers the whole request body for signature verification
 */
import { raw, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import type { ErrorResponse } from '@clipwire/shared-contracts';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      rawBody?: Buffer;
    }
  }
}

function errorStatus(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 400;
}

/**
 * Reads any content type into `req.rawBody` (empty Buffer when there is no
 * body). Oversized or aborted bodies are answered here, before routing.
 */
export function rawBodyMiddleware(limit: number): RequestHandler {
  const parse = raw({ type: () => true, limit });

  return (req: Request, res: Response, next: NextFunction) => {
    parse(req, res, (error?: unknown) => {
      if (error) {
        const status = errorStatus(error);
        const body: ErrorResponse =
          status === 413
            ? { error: { code: 'PAYLOAD_TOO_LARGE', message: `Request body exceeds ${limit} bytes` } }
            : { error: { code: 'BAD_REQUEST', message: 'Could not read request body' } };
        res.status(status).json(body);
        return;
      }
      req.rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      next();
    });
  };
}

export function rawBodyOf(req: Request): Buffer {
  return req.rawBody ?? Buffer.alloc(0);
}
