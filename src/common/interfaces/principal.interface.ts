import { Role, isRole } from '../guard/role/role.enum';

/**
 * Authenticated caller, as resolved from the bearer token.
 */
export interface Principal {
  id: number;
  role: Role;
}

/** Only the part of the request that passport fills in. */
export interface AuthenticatedRequest {
  user?: unknown;
}

export function isPrincipal(value: unknown): value is Principal {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return 'id' in value
    && typeof value.id === 'number'
    && 'role' in value
    && isRole(value.role);
}
