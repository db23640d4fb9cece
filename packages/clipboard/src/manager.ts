import { SILENT_LOGGER, type LoggerLike } from '@clipwire/shared-contracts';

import { BackendTimeoutError, BackendUnavailableError } from './errors.js';
import { InMemoryClipboard } from './memory-backend.js';
import { runWithTimeout } from './timeout.js';
import type { ClipboardBackend, ClipboardState } from './types.js';

export const DEFAULT_OPERATION_TIMEOUT_MS = 2000;
export const DEFAULT_HEALTH_CHECK_INTERVAL_MS = 5000;

export type ClipboardManagerOptions = {
  /** Native or external backend; null starts on the fallback for good. */
  primary: ClipboardBackend | null;
  /** Backend `useExternalTool()` switches to, when one was detected. */
  external?: ClipboardBackend | null;
  fallback?: ClipboardBackend;
  operationTimeoutMs?: number;
  healthCheckIntervalMs?: number;
  logger?: LoggerLike;
};

/**
 * Routes clipboard operations to the primary backend and fails over to the
 * in-memory fallback when the primary stops answering within the timeout.
 * While on the fallback after a timeout, a health check polls the primary
 * and switches back once it responds.
 */
export class ClipboardManager {
  private primary: ClipboardBackend | null;
  private readonly external: ClipboardBackend | null;
  private readonly fallback: ClipboardBackend;
  private active: ClipboardBackend;
  private healthTimer: NodeJS.Timeout | null = null;
  private probing = false;
  /** Set while the last copy was bytes the primary could not hold. */
  private heldInFallback = false;
  private readonly operationTimeoutMs: number;
  private readonly healthCheckIntervalMs: number;
  private readonly logger: LoggerLike;

  constructor(options: ClipboardManagerOptions) {
    this.primary = options.primary;
    this.external = options.external ?? null;
    this.fallback = options.fallback ?? new InMemoryClipboard();
    this.active = this.primary ?? this.fallback;
    this.operationTimeoutMs = options.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;
    this.healthCheckIntervalMs = options.healthCheckIntervalMs ?? DEFAULT_HEALTH_CHECK_INTERVAL_MS;
    this.logger = options.logger ?? SILENT_LOGGER;
  }

  async copy(data: Buffer): Promise<void> {
    const backend = this.active;
    if (backend !== this.fallback && backend.accepts?.(data) === false) {
      this.logger.warn(`${backend.kind} clipboard cannot hold these ${data.length} bytes; keeping them in memory`);
      await this.fallback.write(data);
      this.heldInFallback = true;
      return;
    }
    await this.run('copy', (target, signal) => target.write(data, signal));
    this.heldInFallback = false;
  }

  async paste(): Promise<Buffer> {
    if (this.heldInFallback) return this.fallback.read();
    return this.run('paste', (backend, signal) => backend.read(signal));
  }

  /** Switches to the fallback for the rest of the process; no recovery. */
  useFallback(): void {
    this.stopRecovery();
    this.active = this.fallback;
    this.logger.log('Using in-memory clipboard');
  }

  useExternalTool(): void {
    if (!this.external) {
      throw new BackendUnavailableError('No external clipboard tool found on PATH');
    }
    this.stopRecovery();
    this.primary = this.external;
    this.active = this.external;
    this.logger.log('Using external clipboard tool');
  }

  state(): ClipboardState {
    return {
      activeBackend: this.active.kind,
      usingFallback: this.active === this.fallback,
      healthCheckActive: this.healthTimer !== null,
    };
  }

  stop(): void {
    this.stopRecovery();
  }

  private async run<T>(
    operation: string,
    fn: (backend: ClipboardBackend, signal?: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const backend = this.active;
    if (backend === this.fallback) {
      return fn(backend);
    }

    try {
      return await runWithTimeout(
        (signal) => fn(backend, signal),
        this.operationTimeoutMs,
        `${backend.kind} ${operation}`,
      );
    } catch (error) {
      if (error instanceof BackendTimeoutError) {
        this.logger.warn(`${error.message}; switching to in-memory clipboard`);
        this.failOver(backend);
        return fn(this.fallback);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new BackendUnavailableError(`Clipboard ${operation} failed: ${reason}`, { cause: error });
    }
  }

  private failOver(failed: ClipboardBackend): void {
    // Another request may already have switched.
    if (this.active !== failed) return;
    this.active = this.fallback;
    this.startRecovery();
  }

  private startRecovery(): void {
    if (this.healthTimer !== null || this.primary === null) return;
    this.healthTimer = setInterval(() => void this.probePrimary(), this.healthCheckIntervalMs);
    this.healthTimer.unref();
    this.logger.log(`Health check started (every ${this.healthCheckIntervalMs}ms)`);
  }

  private stopRecovery(): void {
    if (this.healthTimer === null) return;
    clearInterval(this.healthTimer);
    this.healthTimer = null;
  }

  private async probePrimary(): Promise<void> {
    const primary = this.primary;
    if (this.probing || primary === null) return;
    this.probing = true;
    let responsive = true;
    try {
      await runWithTimeout(
        (signal) => primary.read(signal),
        this.operationTimeoutMs,
        `${primary.kind} health check`,
      );
    } catch (error) {
      // An error that arrives in time still counts as responsive.
      responsive = !(error instanceof BackendTimeoutError);
      this.logger.debug?.(`Health check: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      this.probing = false;
    }

    if (!responsive) return;
    if (this.healthTimer === null || this.primary !== primary) return;
    this.stopRecovery();
    this.active = primary;
    this.logger.log(`${primary.kind} clipboard responsive again; switched back`);
  }
}
