import { ROLES, SELF_SERVICE_ROLES } from '@shared/constants';
import type { Role, SelfServiceRole } from '@shared/types';
import { EscrowError } from './errors';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Authorizer {
  hasRole(identity: string, role: Role): boolean;
  grantSelf(identity: string, role: SelfServiceRole): void;
}

export function isSelfServiceRole(role: string): role is SelfServiceRole {
  return SELF_SERVICE_ROLES.some((candidate) => candidate === role);
}

// ---------------------------------------------------------------------------
// Role Registry
// ---------------------------------------------------------------------------

/**
 * Capability map keyed by (identity, role). Client and Freelancer standing is
 * self-service; Administrator standing is seeded for the initializing
 * identity and afterwards only changed by an existing Administrator.
 */
export class RoleRegistry implements Authorizer {
  private readonly members = new Map<Role, Set<string>>();

  constructor(initialAdmin: string) {
    if (!initialAdmin) {
      throw new Error('An initial administrator identity is required');
    }
    for (const role of ROLES) {
      this.members.set(role, new Set());
    }
    this.holders('administrator').add(initialAdmin);
  }

  hasRole(identity: string, role: Role): boolean {
    return this.holders(role).has(identity);
  }

  rolesOf(identity: string): Role[] {
    return ROLES.filter((role) => this.hasRole(identity, role));
  }

  grantSelf(identity: string, role: SelfServiceRole): void {
    // Callers outside the type system (HTTP bodies) can still name 'administrator'.
    if (!isSelfServiceRole(role)) {
      throw new EscrowError('Unauthorized', `Role '${role}' cannot be self-granted`);
    }
    this.holders(role).add(identity);
  }

  revokeSelf(identity: string, role: SelfServiceRole): void {
    if (!isSelfServiceRole(role)) {
      throw new EscrowError('Unauthorized', `Role '${role}' cannot be self-revoked`);
    }
    this.holders(role).delete(identity);
  }

  // --- Administrator path ---

  grantAdmin(caller: string, target: string): void {
    this.requireAdmin(caller);
    this.holders('administrator').add(target);
  }

  revokeAdmin(caller: string, target: string): void {
    this.requireAdmin(caller);
    const admins = this.holders('administrator');
    if (admins.has(target) && admins.size === 1) {
      throw new EscrowError(
        'LastAdministrator',
        `Cannot revoke '${target}': at least one administrator must remain`,
      );
    }
    admins.delete(target);
  }

  admins(): string[] {
    return [...this.holders('administrator')].sort();
  }

  private requireAdmin(caller: string): void {
    if (!this.hasRole(caller, 'administrator')) {
      throw new EscrowError('Unauthorized', `'${caller}' is not an administrator`);
    }
  }

  private holders(role: Role): Set<string> {
    let set = this.members.get(role);
    if (!set) {
      set = new Set();
      this.members.set(role, set);
    }
    return set;
  }
}
