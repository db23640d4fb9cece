/**
 * @file logger.ts
 * @description Minimal logger shape accepted by the framework-free packages
 *
 * NestJS `Logger` instances satisfy it, so apps pass theirs straight through.
 */
export interface LoggerLike {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug?(message: string): void;
}

const noop = (): void => {};

export const SILENT_LOGGER: LoggerLike = {
  log: noop,
  warn: noop,
  error: noop,
  debug: noop,
};
