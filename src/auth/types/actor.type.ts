import { RoleEnum } from '../../roles/roles.enum';

export type Actor = {
  subject: string;
  role: RoleEnum;
};

export const SYSTEM_ACTOR: Actor = {
  subject: 'system',
  role: RoleEnum.admin,
};
