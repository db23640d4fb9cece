export type BackendKind = 'native' | 'external' | 'memory';

/**
 * A place clipboard bytes can be written to and read from. Implementations
 * may hang; callers bound them with a timeout and abort `signal` when it fires.
 */
export interface ClipboardBackend {
  readonly kind: BackendKind;
  write(data: Buffer, signal?: AbortSignal): Promise<void>;
  read(signal?: AbortSignal): Promise<Buffer>;
  /** False when `data` would not read back byte for byte. Absent: any bytes. */
  accepts?(data: Buffer): boolean;
}

export type ClipboardState = {
  activeBackend: BackendKind;
  usingFallback: boolean;
  healthCheckActive: boolean;
};
