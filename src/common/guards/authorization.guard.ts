import { CanActivate, ExecutionContext, Inject, Injectable, UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';
import { GATEWAY_CONFIG, GatewayConfig } from '../../config/gateway.config';

export const UNAUTHORIZED_MESSAGE = 'No authorization header or invalid authorization value.';

const stripBearer = (value: string) => value.replace(/^Bearer\s+/i, '');

/**
 * Optional shared secret. The secret only guards this gateway and is never
 * forwarded upstream. Preflight requests pass, browsers never attach
 * credentials to them.
 */
@Injectable()
export class AuthorizationGuard implements CanActivate {
  constructor(@Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.config.authorization;
    if (!expected) return true;

    const request = context.switchToHttp().getRequest<Request>();
    if (request.method === 'OPTIONS') return true;

    const header = request.headers.authorization;
    if (!header || stripBearer(header) !== stripBearer(expected)) {
      throw new UnauthorizedException(UNAUTHORIZED_MESSAGE);
    }
    return true;
  }
}
