import { err, ok, Result } from './result';

export enum Role {
  STANDARD = 'STANDARD',
  MEMBER = 'MEMBER',
  ADMIN = 'ADMIN',
}

export interface UserContext {
  id: string;
  role: Role;
}

export interface UnknownRole {
  code: 'UNKNOWN_ROLE';
  value: string;
}

const ROLES: ReadonlyMap<string, Role> = new Map(
  Object.values(Role).map((role) => [role, role]),
);

export function parseRole(value: string): Result<Role, UnknownRole> {
  const role = ROLES.get(value.trim().toUpperCase());
  return role ? ok(role) : err({ code: 'UNKNOWN_ROLE', value });
}
