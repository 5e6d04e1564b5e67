import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ROLES_KEY } from './roles.decorator';
import { Role } from './role.enum';
import { AuthenticatedRequest, isPrincipal } from '../../interfaces/principal.interface';
import { RoleForbiddenException } from '../../exception/learning.exceptions';

/**
 * Checks `request.user.role` against the roles declared with `@Roles()`.
 * A handler-level declaration overrides the controller-level one.
 */
@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) { }

  canActivate(context: ExecutionContext): boolean {
    const requiredRoles = this.reflector.getAllAndOverride<Role[] | undefined>(ROLES_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (!requiredRoles || requiredRoles.length === 0) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const user = request.user;
    if (!isPrincipal(user) || !requiredRoles.includes(user.role)) {
      throw new RoleForbiddenException(requiredRoles);
    }
    return true;
  }
}
