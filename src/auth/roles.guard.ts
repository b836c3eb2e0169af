import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { isAuthEnabled } from './auth.config';
import { ROLES_KEY, RoleValue } from './roles.decorator';
import { AuthUser } from './user.decorator';

@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    // Sin auth no hay req.user: no se fuerzan roles
    if (!isAuthEnabled()) return true;

    const required = this.reflector.getAllAndOverride<RoleValue[] | undefined>(ROLES_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (!required || required.length === 0) return true;

    const req = context.switchToHttp().getRequest<{ user?: AuthUser }>();
    const role = req?.user?.role;
    if (!role) return false;
    return required.some((r) => r === role);
  }
}
