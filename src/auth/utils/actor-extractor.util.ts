import { UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';
import { isRole } from '../../roles/roles.enum';
import { Actor } from '../types/actor.type';

/**
 * Builds the acting principal from the claims the JWT strategy attached to
 * the request. Guards run first, so a missing claim means a misconfigured
 * route rather than a bad token.
 */
export function extractActorFromRequest(req: Request): Actor {
  const user: unknown = req.user;
  if (typeof user !== 'object' || user === null) {
    throw new UnauthorizedException('No authenticated principal on request');
  }

  const subject = 'sub' in user ? user.sub : undefined;
  const role = 'role' in user ? user.role : undefined;
  if (typeof subject !== 'string' || !isRole(role)) {
    throw new UnauthorizedException('Principal is missing subject or role');
  }

  return { subject, role };
}
