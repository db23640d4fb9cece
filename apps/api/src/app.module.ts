import { type DynamicModule, Module } from '@nestjs/common';

import { AuthModule } from './auth/auth.module.js';
import { ClipboardModule } from './clipboard/clipboard.module.js';
import { type ServerContext, ServerContextModule } from './context/server-context.module.js';

@Module({})
export class AppModule {
  static register(context: ServerContext): DynamicModule {
    return {
      module: AppModule,
      imports: [ServerContextModule.forRoot(context), AuthModule, ClipboardModule],
    };
  }
}
