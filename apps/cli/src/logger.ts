import { ConsoleLogger, type LogLevel } from '@nestjs/common';
import { SILENT_LOGGER, type LoggerLike } from '@clipwire/shared-contracts';

/**
 * ConsoleLogger that writes every level to stderr; stdout is reserved for
 * command output such as `paste`.
 */
export class StderrLogger extends ConsoleLogger {
  protected printMessages(
    messages: unknown[],
    context?: string,
    logLevel?: LogLevel,
    _writeStreamType?: 'stdout' | 'stderr',
  ): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}

export function createCliLogger(enabled: boolean, context: string): LoggerLike {
  return enabled ? new StderrLogger(context) : SILENT_LOGGER;
}
