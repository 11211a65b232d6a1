import { Role, isRole } from './permissions';

/** The authenticated caller of an operation. */
export interface Actor {
  id: string;
  role: Role;
  name?: string | null;
  email?: string | null;
}

export const SYSTEM_ACTOR: Actor = Object.freeze({
  id: '00000000-0000-0000-0000-000000000000',
  role: Role.SYSTEM,
  name: 'System',
});

export function isActor(value: unknown): value is Actor {
  if (typeof value !== 'object' || value === null) return false;
  if (!('id' in value) || !('role' in value)) return false;
  return typeof value.id === 'string' && isRole(value.role);
}
