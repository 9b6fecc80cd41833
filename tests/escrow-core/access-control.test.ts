import { describe, it, expect, beforeEach } from 'vitest';
import { EscrowError, RoleRegistry, isSelfServiceRole } from '@core/index';

let roles: RoleRegistry;

beforeEach(() => {
  roles = new RoleRegistry('root');
});

describe('RoleRegistry', () => {
  it('seeds the initializing identity as administrator', () => {
    expect(roles.hasRole('root', 'administrator')).toBe(true);
    expect(roles.rolesOf('root')).toEqual(['administrator']);
    expect(roles.admins()).toEqual(['root']);
  });

  it('requires an initial administrator', () => {
    expect(() => new RoleRegistry('')).toThrow('An initial administrator identity is required');
  });

  it('grants client and freelancer standing on request', () => {
    roles.grantSelf('alice', 'client');
    roles.grantSelf('alice', 'freelancer');
    expect(roles.rolesOf('alice')).toEqual(['client', 'freelancer']);
  });

  it('is idempotent', () => {
    roles.grantSelf('alice', 'client');
    roles.grantSelf('alice', 'client');
    expect(roles.rolesOf('alice')).toEqual(['client']);
  });

  it('keeps identities apart', () => {
    roles.grantSelf('alice', 'client');
    expect(roles.hasRole('bob', 'client')).toBe(false);
  });

  it('drops self-service standing on revoke', () => {
    roles.grantSelf('alice', 'client');
    roles.revokeSelf('alice', 'client');
    expect(roles.hasRole('alice', 'client')).toBe(false);
  });
});

describe('administrator path', () => {
  it('lets an administrator appoint another', () => {
    roles.grantAdmin('root', 'ops');
    expect(roles.admins()).toEqual(['ops', 'root']);
  });

  it('refuses non-administrators', () => {
    roles.grantSelf('alice', 'client');
    expect(() => roles.grantAdmin('alice', 'alice')).toThrow(EscrowError);
    expect(roles.hasRole('alice', 'administrator')).toBe(false);
  });

  it('keeps at least one administrator', () => {
    let error: unknown;
    try {
      roles.revokeAdmin('root', 'root');
    } catch (err) {
      error = err;
    }
    expect(error).toHaveProperty('code', 'LastAdministrator');
    expect(roles.admins()).toEqual(['root']);
  });

  it('allows stepping down once another administrator exists', () => {
    roles.grantAdmin('root', 'ops');
    roles.revokeAdmin('ops', 'root');
    expect(roles.admins()).toEqual(['ops']);
  });
});

describe('role predicates', () => {
  it('recognise self-service roles', () => {
    expect(isSelfServiceRole('client')).toBe(true);
    expect(isSelfServiceRole('freelancer')).toBe(true);
    expect(isSelfServiceRole('administrator')).toBe(false);
  });
});
