import { join } from 'node:path';

import { type INestApplication, Logger, type LoggerService } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { type ClipboardMode, createClipboardManager } from '@clipwire/clipboard';
import { TrustStore } from '@clipwire/crypto';
import { AUTHORIZED_KEYS_FILE, MAX_REQUEST_BODY_BYTES } from '@clipwire/shared-contracts';

import { AppModule } from './app.module.js';
import type { ServerContext } from './context/server-context.module.js';
import type { ProcessLifecycle } from './context/tokens.js';
import { AllExceptionsFilter } from './filters/all-exceptions.filter.js';
import { rawBodyMiddleware } from './middleware/raw-body.middleware.js';
import { ensureCertificate, type TlsMaterial } from './tls/certificate.js';
import { openWithDefaultApp } from './url-opener.js';

/** Middleware and filters shared by the real server and the e2e tests. */
export function configureApp<T extends INestApplication>(app: T): T {
  app.use(rawBodyMiddleware(MAX_REQUEST_BODY_BYTES));
  app.useGlobalFilters(new AllExceptionsFilter());
  return app;
}

export type CreateServerAppOptions = {
  tls?: TlsMaterial;
  logger?: LoggerService | false;
};

export async function createServerApp(
  context: ServerContext,
  options: CreateServerAppOptions = {},
): Promise<INestApplication> {
  const app = await NestFactory.create(AppModule.register(context), {
    bodyParser: false,
    httpsOptions: options.tls,
    logger: options.logger,
  });
  return configureApp(app);
}

export type RunServerOptions = {
  configDir: string;
  port: number;
  host?: string;
  mode?: ClipboardMode;
  logger?: LoggerService;
  /** Called once the app has closed after `/quit`. */
  exit?: (code: number) => void;
};

export type RunningServer = {
  app: INestApplication;
  url: string;
  close(): Promise<void>;
};

/**
 * Loads trusted keys and the TLS certificate from `configDir`, picks a
 * clipboard backend and serves HTTPS on `host:port` until `/quit` or a signal.
 */
export async function runServer(options: RunServerOptions): Promise<RunningServer> {
  const logger = new Logger('SyncServer');
  const host = options.host ?? '0.0.0.0';
  const exit = options.exit ?? ((code: number) => process.exit(code));

  const trustStore = await TrustStore.load(join(options.configDir, AUTHORIZED_KEYS_FILE), new Logger('TrustStore'));
  const tls = await ensureCertificate(options.configDir, logger);
  const clipboard = await createClipboardManager({
    mode: options.mode,
    logger: new Logger('ClipboardManager'),
  });

  let app: INestApplication | null = null;
  let closing: Promise<void> | null = null;
  const close = (): Promise<void> => {
    closing ??= app ? app.close() : Promise.resolve();
    return closing;
  };
  const lifecycle: ProcessLifecycle = {
    terminate: () => {
      close().then(
        () => exit(0),
        (error: unknown) => {
          logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
          exit(1);
        },
      );
    },
  };

  app = await createServerApp(
    { clipboard, trustStore, openUrl: openWithDefaultApp, lifecycle },
    { tls, logger: options.logger },
  );
  app.enableShutdownHooks();
  await app.listen(options.port, host);

  const url = `https://${host}:${options.port}`;
  logger.log(`Listening on ${url} with ${trustStore.size} authorized key(s)`);
  return { app, url, close };
}
