import { CanActivate, ExecutionContext, Inject, Injectable, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { AuthenticatedRequest } from '../common/http/authenticated-request';
import { JsonLogger } from '../logging/json-logger.service';
import { USER_STORE, type UserStore } from '../users/user.store';
import { IS_PUBLIC_KEY } from './public.decorator';
import { TokenService } from './token.service';

/** Auth schemes are case-insensitive; anything after the token makes the header malformed. */
export function extractBearerToken(authorization: string | undefined): string | undefined {
  if (!authorization) return undefined;
  const [scheme, token, ...rest] = authorization.trim().split(/\s+/);
  return scheme.toLowerCase() === 'bearer' && token && rest.length === 0 ? token : undefined;
}

// Global guard. Flow: Authorization: Bearer <token> -> signature and validity
// window checked by TokenService -> issuer pseudo resolved to a User ->
// request.user set for RightsGuard and handlers.
@Injectable()
export class TokenAuthGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly tokens: TokenService,
    @Inject(USER_STORE) private readonly users: UserStore,
    private readonly logger: JsonLogger
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const isPublic = this.reflector.getAllAndOverride<boolean | undefined>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass()
    ]);
    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearerToken(request.headers.authorization);
    if (!token) {
      this.logger.warn('Missing bearer token');
      throw new UnauthorizedException('Authorization header missing or malformed');
    }

    const claims = await this.tokens.verify(token);
    if (!claims) {
      this.logger.warn('Token rejected');
      throw new UnauthorizedException('Invalid or expired token');
    }

    const user = await this.users.findByPseudo(claims.iss);
    if (!user) {
      this.logger.warn('Token issuer is not a known user', { issuer: claims.iss });
      throw new UnauthorizedException('Invalid or expired token');
    }

    request.user = user;
    return true;
  }
}
