export { AppModule } from './app.module.js';
export {
  configureApp,
  createServerApp,
  runServer,
  type CreateServerAppOptions,
  type RunServerOptions,
  type RunningServer,
} from './bootstrap.js';
export type { ServerContext } from './context/server-context.module.js';
export type { ProcessLifecycle, UrlOpener } from './context/tokens.js';
export { CERT_FILE, KEY_FILE, ensureCertificate, type TlsMaterial } from './tls/certificate.js';
export { openWithDefaultApp } from './url-opener.js';
