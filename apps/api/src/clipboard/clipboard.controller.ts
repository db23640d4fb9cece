/**
 * @file clipboard.controller.ts
 * @description /copy, /paste, /open and /quit
 */
import {
  BadRequestException,
  Controller,
  Get,
  HttpCode,
  Inject,
  InternalServerErrorException,
  Logger,
  Post,
  Req,
  Res,
  StreamableFile,
  UseGuards,
} from '@nestjs/common';
import type { ClipboardManager } from '@clipwire/clipboard';
import { ROUTES } from '@clipwire/shared-contracts';
import type { Request, Response } from 'express';

import { AuthGuard } from '../auth/auth.guard.js';
import {
  CLIPBOARD_MANAGER,
  PROCESS_LIFECYCLE,
  URL_OPENER,
  type ProcessLifecycle,
  type UrlOpener,
} from '../context/tokens.js';
import { rawBodyOf } from '../middleware/raw-body.middleware.js';

@Controller()
@UseGuards(AuthGuard)
export class ClipboardController {
  private readonly logger = new Logger(ClipboardController.name);

  constructor(
    @Inject(CLIPBOARD_MANAGER) private readonly clipboard: ClipboardManager,
    @Inject(URL_OPENER) private readonly openUrl: UrlOpener,
    @Inject(PROCESS_LIFECYCLE) private readonly lifecycle: ProcessLifecycle,
  ) {}

  @Post(ROUTES.copy)
  @HttpCode(200)
  async copy(@Req() req: Request): Promise<void> {
    const data = rawBodyOf(req);
    await this.clipboard.copy(data);
    this.logger.log(`Copied ${data.length} bytes`);
  }

  @Get(ROUTES.paste)
  async paste(): Promise<StreamableFile> {
    const data = await this.clipboard.paste();
    this.logger.log(`Pasted ${data.length} bytes`);
    return new StreamableFile(data, { type: 'application/octet-stream', length: data.length });
  }

  @Post(ROUTES.open)
  @HttpCode(200)
  async open(@Req() req: Request): Promise<void> {
    const url = rawBodyOf(req).toString('utf8').trim();
    if (!url) {
      throw new BadRequestException({ code: 'BAD_REQUEST', message: 'Request body must contain a URL' });
    }
    try {
      await this.openUrl(url);
    } catch (error) {
      throw new InternalServerErrorException({
        code: 'OPEN_URL_FAILED',
        message: `Could not open ${url}: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
    this.logger.log(`Opened ${url}`);
  }

  @Post(ROUTES.quit)
  quit(@Res() res: Response): void {
    this.logger.log('Quit requested');
    res.once('finish', () => this.lifecycle.terminate());
    res.status(200).end();
  }
}
