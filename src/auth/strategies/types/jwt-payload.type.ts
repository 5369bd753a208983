import { RoleEnum } from '../../../roles/roles.enum';

/**
 * Verified claims attached to `request.user` by the JWT strategy.
 */
export type JwtPayloadType = {
  sub: string;
  role: RoleEnum;
  iat?: number;
  exp?: number;
};
