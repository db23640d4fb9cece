import { type DynamicModule, Global, Module } from '@nestjs/common';
import type { ClipboardManager } from '@clipwire/clipboard';
import type { TrustStore } from '@clipwire/crypto';

import {
  CLIPBOARD_MANAGER,
  PROCESS_LIFECYCLE,
  TRUST_STORE,
  URL_OPENER,
  type ProcessLifecycle,
  type UrlOpener,
} from './tokens.js';

export type ServerContext = {
  clipboard: ClipboardManager;
  trustStore: TrustStore;
  openUrl: UrlOpener;
  lifecycle: ProcessLifecycle;
};

/**
 * Makes the objects built at startup (clipboard, trusted keys, process hooks)
 * injectable everywhere.
 */
@Global()
@Module({})
export class ServerContextModule {
  static forRoot(context: ServerContext): DynamicModule {
    const providers = [
      { provide: CLIPBOARD_MANAGER, useValue: context.clipboard },
      { provide: TRUST_STORE, useValue: context.trustStore },
      { provide: URL_OPENER, useValue: context.openUrl },
      { provide: PROCESS_LIFECYCLE, useValue: context.lifecycle },
    ];
    return {
      module: ServerContextModule,
      providers,
      exports: providers.map((provider) => provider.provide),
    };
  }
}
