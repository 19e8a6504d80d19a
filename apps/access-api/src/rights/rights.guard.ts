import { CanActivate, ExecutionContext, ForbiddenException, Injectable, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { AuthenticatedRequest } from '../common/http/authenticated-request';
import { JsonLogger } from '../logging/json-logger.service';
import { PROTECTED_RESOURCE_KEY } from './protected-resource.decorator';
import { describeResource, resource, specificResource } from './resource';
import { toRestMethod } from './rest-method.enum';
import { RightsService } from './rights.service';

/**
 * Checks the authenticated user against the Rights store.
 * Runs after the global TokenAuthGuard, which sets request.user.
 * Fails closed: no @ProtectedResource metadata or an unmapped HTTP verb is a 403.
 */
@Injectable()
export class RightsGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly rights: RightsService,
    private readonly logger: JsonLogger
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    const user = request.user;
    if (!user) throw new UnauthorizedException('Unauthorized');

    const name = this.reflector.getAllAndOverride<string | undefined>(PROTECTED_RESOURCE_KEY, [
      context.getHandler(),
      context.getClass()
    ]);
    if (!name) throw new ForbiddenException('Forbidden');

    const method = toRestMethod(request.method);
    if (!method) throw new ForbiddenException('Forbidden');

    const instanceId = request.params?.id;
    const target = instanceId ? specificResource(name, instanceId) : resource(name);

    if (!(await this.rights.isGranted(user, target, method))) {
      this.logger.warn('Access denied', { userPseudo: user.pseudo, resource: describeResource(target), method });
      throw new ForbiddenException('Forbidden');
    }

    return true;
  }
}
