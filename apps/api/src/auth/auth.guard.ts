/**
 * @file auth.guard.ts
 * @description Rejects requests not signed by a trusted key
 */
import {
  BadRequestException,
  type CanActivate,
  type ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { HEADER_FINGERPRINT, HEADER_SIGNATURE } from '@clipwire/shared-contracts';
import type { Request } from 'express';

import { rawBodyOf } from '../middleware/raw-body.middleware.js';
import { AuthService } from './auth.service.js';

function singleHeader(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first?.trim() || undefined;
}

@Injectable()
export class AuthGuard implements CanActivate {
  constructor(private readonly authService: AuthService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();

    const fingerprint = singleHeader(request.headers[HEADER_FINGERPRINT.toLowerCase()]);
    const signature = singleHeader(request.headers[HEADER_SIGNATURE.toLowerCase()]);
    if (!fingerprint || !signature) {
      throw new UnauthorizedException({
        code: 'MISSING_AUTH_HEADERS',
        message: `Missing ${HEADER_FINGERPRINT} or ${HEADER_SIGNATURE} header`,
      });
    }

    const result = this.authService.verifyRequest({
      fingerprint,
      signature,
      payload: rawBodyOf(request),
    });
    if (result.valid) return true;

    const body = { code: result.errorCode, message: result.message };
    if (result.errorCode === 'INVALID_SIGNATURE_ENCODING' || result.errorCode === 'INVALID_SIGNATURE_FORMAT') {
      throw new BadRequestException(body);
    }
    throw new UnauthorizedException(body);
  }
}
