export enum RoleEnum {
  reader = 'reader',
  author = 'author',
  curator = 'curator',
  admin = 'admin',
}

const ROLE_VALUES: ReadonlySet<string> = new Set(Object.values(RoleEnum));

export function isRole(value: unknown): value is RoleEnum {
  return typeof value === 'string' && ROLE_VALUES.has(value);
}

// Each role may do everything the roles before it may do.
const ROLE_RANK: Record<RoleEnum, number> = {
  [RoleEnum.reader]: 0,
  [RoleEnum.author]: 1,
  [RoleEnum.curator]: 2,
  [RoleEnum.admin]: 3,
};

export function roleSatisfies(actual: RoleEnum, required: RoleEnum): boolean {
  return ROLE_RANK[actual] >= ROLE_RANK[required];
}
