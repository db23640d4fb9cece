import type { ClipboardBackend } from './types.js';

/** Process-local clipboard; always available. */
export class InMemoryClipboard implements ClipboardBackend {
  readonly kind = 'memory' as const;
  private content: Buffer = Buffer.alloc(0);

  async write(data: Buffer): Promise<void> {
    this.content = Buffer.from(data);
  }

  async read(): Promise<Buffer> {
    return Buffer.from(this.content);
  }
}
