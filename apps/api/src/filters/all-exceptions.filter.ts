/**
 * @file all-exceptions.filter.ts
 * @description Renders every error as `{ error: { code, message, details? } }`
 */
import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { BackendUnavailableError } from '@clipwire/clipboard';
import { type ErrorCode, type ErrorResponse, zErrorCode } from '@clipwire/shared-contracts';
import type { Response } from 'express';

type ApiError = ErrorResponse['error'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, error } = this.toApiError(exception);

    if (status >= 500) {
      this.logger.error(
        `${error.code}: ${exception instanceof Error ? exception.message : String(exception)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    if (response.headersSent) return;
    const body: ErrorResponse = { error };
    response.status(status).json(body);
  }

  private toApiError(exception: unknown): { status: number; error: ApiError } {
    if (exception instanceof BackendUnavailableError) {
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        error: { code: 'CLIPBOARD_UNAVAILABLE', message: exception.message },
      };
    }

    if (!(exception instanceof HttpException)) {
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
      };
    }

    const status = exception.getStatus();
    const payload = exception.getResponse();
    if (typeof payload === 'string') {
      return { status, error: { code: this.statusToCode(status), message: payload } };
    }

    if (isRecord(payload)) {
      // Thrown as `new XxxException({ code, message, details? })`
      const code = zErrorCode.safeParse(payload.code);
      if (code.success) {
        const error: ApiError = {
          code: code.data,
          message: typeof payload.message === 'string' ? payload.message : exception.message,
        };
        if (isRecord(payload.details)) error.details = payload.details;
        return { status, error };
      }

      // NestJS default format: { message, error, statusCode }
      const message = Array.isArray(payload.message) ? payload.message[0] : payload.message;
      return {
        status,
        error: {
          code: this.statusToCode(status),
          message: typeof message === 'string' ? message : exception.message,
        },
      };
    }

    return { status, error: { code: this.statusToCode(status), message: exception.message } };
  }

  private statusToCode(status: number): ErrorCode {
    switch (status) {
      case 400:
        return 'BAD_REQUEST';
      case 401:
        return 'SIGNATURE_VERIFICATION_FAILED';
      case 404:
        return 'NOT_FOUND';
      case 413:
        return 'PAYLOAD_TOO_LARGE';
      default:
        return status >= 500 ? 'INTERNAL_ERROR' : 'BAD_REQUEST';
    }
  }
}
