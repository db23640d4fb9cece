import type { SigningIdentity } from '@clipwire/crypto';
import {
  type ErrorCode,
  HEADER_FINGERPRINT,
  HEADER_SIGNATURE,
  ROUTE_METHODS,
  ROUTES,
  type RouteName,
  SILENT_LOGGER,
  type LoggerLike,
  zErrorResponse,
} from '@clipwire/shared-contracts';

import { nodeTransport, type Transport, type TransportResponse } from './transport.js';

/** The server answered with a non-2xx status. */
export class RequestFailedError extends Error {
  constructor(
    readonly status: number,
    readonly code: ErrorCode | null,
    message: string,
  ) {
    super(message);
    this.name = 'RequestFailedError';
  }
}

function toRequestFailedError(response: TransportResponse): RequestFailedError {
  let decoded: unknown;
  try {
    decoded = JSON.parse(response.body.toString('utf8'));
  } catch {
    decoded = null;
  }
  const parsed = zErrorResponse.safeParse(decoded);
  if (parsed.success) {
    const { code, message } = parsed.data.error;
    return new RequestFailedError(response.status, code, `${message} (${code}, HTTP ${response.status})`);
  }
  return new RequestFailedError(response.status, null, `Server answered HTTP ${response.status}`);
}

export type SyncClientOptions = {
  baseUrl: URL;
  identity: SigningIdentity;
  transport?: Transport;
  logger?: LoggerLike;
};

/**
 * Signs each request body with the client's key and talks to a clipwire
 * server.
 */
export class SyncClient {
  private readonly transport: Transport;
  private readonly logger: LoggerLike;

  constructor(private readonly options: SyncClientOptions) {
    this.transport = options.transport ?? nodeTransport;
    this.logger = options.logger ?? SILENT_LOGGER;
  }

  async copy(data: Buffer): Promise<void> {
    await this.send('copy', data);
  }

  async paste(): Promise<Buffer> {
    const response = await this.send('paste');
    return response.body;
  }

  async open(url: string): Promise<void> {
    await this.send('open', Buffer.from(url, 'utf8'));
  }

  async quit(): Promise<void> {
    await this.send('quit');
  }

  private async send(route: RouteName, body: Buffer = Buffer.alloc(0)): Promise<TransportResponse> {
    const url = new URL(ROUTES[route], this.options.baseUrl);
    const method = ROUTE_METHODS[route];
    this.logger.debug?.(`${method} ${url.href} (${body.length} bytes)`);

    const response = await this.transport({
      method,
      url,
      body,
      headers: {
        'Content-Type': 'application/octet-stream',
        [HEADER_FINGERPRINT]: this.options.identity.fingerprint(),
        [HEADER_SIGNATURE]: this.options.identity.signBase64(body),
      },
    });

    if (response.status < 200 || response.status >= 300) {
      throw toRequestFailedError(response);
    }
    this.logger.log(`${route}: HTTP ${response.status}`);
    return response;
  }
}
