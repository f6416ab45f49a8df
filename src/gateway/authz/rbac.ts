import { Role, RolePolicy } from '../../shared/types';

export type Decision = 'allow' | 'deny';

/**
 * RBAC decision for one resource.
 *
 * `any`: at least one required role is held. `all`: every required role is held.
 * A resource without required roles is open to any authenticated subject.
 */
export function authorize(
  tokenRoles: readonly Role[],
  requiredRoles: readonly Role[],
  policy: RolePolicy = 'any'
): Decision {
  if (requiredRoles.length === 0) {
    return 'allow';
  }

  const held = new Set(tokenRoles);
  const granted = policy === 'all'
    ? requiredRoles.every(role => held.has(role))
    : requiredRoles.some(role => held.has(role));

  return granted ? 'allow' : 'deny';
}
