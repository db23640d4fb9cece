import clipboardy from 'clipboardy';

import { BackendUnavailableError } from './errors.js';
import type { ClipboardBackend } from './types.js';

export type TextClipboard = {
  read(): Promise<string>;
  write(text: string): Promise<void>;
};

/**
 * The host clipboard through clipboardy. It holds UTF-8 text only, so bytes
 * that do not survive a UTF-8 round trip are refused rather than mangled.
 */
export class NativeClipboard implements ClipboardBackend {
  readonly kind = 'native' as const;

  constructor(private readonly clipboard: TextClipboard = clipboardy) {}

  accepts(data: Buffer): boolean {
    return Buffer.from(data.toString('utf8'), 'utf8').equals(data);
  }

  async write(data: Buffer): Promise<void> {
    if (!this.accepts(data)) {
      throw new BackendUnavailableError('Native clipboard holds UTF-8 text only');
    }
    await this.clipboard.write(data.toString('utf8'));
  }

  async read(): Promise<Buffer> {
    return Buffer.from(await this.clipboard.read(), 'utf8');
  }
}
