import { Injectable, CanActivate, ExecutionContext } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { isRole, RoleEnum, roleSatisfies } from './roles.enum';
import { ROLES_KEY } from './roles.decorator';

@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const roles =
      this.reflector.getAllAndOverride<RoleEnum[] | undefined>(ROLES_KEY, [
        context.getHandler(),
        context.getClass(),
      ]) ?? [];
    if (!roles.length) {
      return true;
    }
    const request = context.switchToHttp().getRequest<Request>();

    const user: unknown = request.user;
    const userRole =
      typeof user === 'object' && user !== null && 'role' in user
        ? user.role
        : undefined;
    if (!isRole(userRole)) {
      return false;
    }

    // The lowest listed role is enough; higher ranks inherit it
    return roles.some((required) => roleSatisfies(userRole, required));
  }
}
