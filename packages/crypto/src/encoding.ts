const BASE64_PATTERN =
  /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Decodes padded standard base64. Returns null for anything else, where
 * `Buffer.from(text, 'base64')` would silently drop the offending characters.
 */
export function decodeBase64Strict(text: string): Buffer | null {
  if (text.length === 0 || !BASE64_PATTERN.test(text)) return null;
  return Buffer.from(text, 'base64');
}

export function bytesToUnpaddedBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64').replace(/=+$/, '');
}

/** SSH `string`: uint32 big-endian length followed by the bytes. */
export function encodeSshString(data: Uint8Array | string): Buffer {
  const bytes = typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
  const length = Buffer.alloc(4);
  length.writeUInt32BE(bytes.length, 0);
  return Buffer.concat([length, bytes]);
}

export class SshWireReader {
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {}

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  /** Returns null when the buffer ends before the declared length. */
  readString(): Buffer | null {
    if (this.remaining < 4) return null;
    const view = Buffer.from(this.bytes.buffer, this.bytes.byteOffset, this.bytes.byteLength);
    const length = view.readUInt32BE(this.offset);
    const start = this.offset + 4;
    if (length > this.bytes.length - start) return null;
    this.offset = start + length;
    return Buffer.from(view.subarray(start, start + length));
  }
}
