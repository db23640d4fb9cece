import http, { type IncomingHttpHeaders } from 'node:http';
import https from 'node:https';

export type TransportRequest = {
  method: 'GET' | 'POST';
  url: URL;
  headers: Record<string, string>;
  body: Buffer;
};

export type TransportResponse = {
  status: number;
  headers: IncomingHttpHeaders;
  body: Buffer;
};

export type Transport = (request: TransportRequest) => Promise<TransportResponse>;

/** Network-level failure: nothing usable came back from the server. */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * Node's http/https client. The server's certificate is self-signed, so it is
 * not validated; requests are authenticated by their signature instead.
 */
export const nodeTransport: Transport = (request) =>
  new Promise<TransportResponse>((resolve, reject) => {
    const options = {
      method: request.method,
      headers: { ...request.headers, 'Content-Length': String(request.body.length) },
    };
    const onResponse = (res: http.IncomingMessage) => {
      const chunks: Buffer[] = [];
      res.on('data', (chunk: Buffer) => chunks.push(chunk));
      res.once('error', (error) => reject(new TransportError(error.message, { cause: error })));
      res.once('end', () => {
        resolve({ status: res.statusCode ?? 0, headers: res.headers, body: Buffer.concat(chunks) });
      });
    };

    const req =
      request.url.protocol === 'http:'
        ? http.request(request.url, options, onResponse)
        : https.request(request.url, { ...options, rejectUnauthorized: false }, onResponse);

    req.once('error', (error) => {
      reject(new TransportError(`Cannot reach ${request.url.origin}: ${error.message}`, { cause: error }));
    });
    req.end(request.body);
  });
