import { Inject, Module, type OnApplicationShutdown } from '@nestjs/common';
import type { ClipboardManager } from '@clipwire/clipboard';

import { AuthModule } from '../auth/auth.module.js';
import { CLIPBOARD_MANAGER } from '../context/tokens.js';
import { ClipboardController } from './clipboard.controller.js';

@Module({
  imports: [AuthModule],
  controllers: [ClipboardController],
})
export class ClipboardModule implements OnApplicationShutdown {
  constructor(@Inject(CLIPBOARD_MANAGER) private readonly clipboard: ClipboardManager) {}

  onApplicationShutdown(): void {
    this.clipboard.stop();
  }
}
