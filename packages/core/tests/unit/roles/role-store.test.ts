import { describe, it, expect } from 'vitest';
import { readStoredRoles, storedRoleNames } from '../../../src/roles/role-store';
import { parseRolesHeader } from '../../../src/roles/header';

describe('readStoredRoles', () => {
  it('should classify a string sequence', () => {
    expect(readStoredRoles(['user', 'admin'])).toEqual({
      kind: 'strings',
      roles: ['user', 'admin'],
    });
  });

  it('should classify a mixed sequence', () => {
    const stored = readStoredRoles(['user', 42, null, 'admin']);

    expect(stored.kind).toBe('mixed');
    expect(storedRoleNames(stored)).toEqual(['user', 'admin']);
  });

  it.each([
    ['undefined', undefined],
    ['a plain string', 'admin'],
    ['an object', { roles: ['admin'] }],
    ['a number', 7],
  ])('should treat %s as absent', (_label, value) => {
    expect(readStoredRoles(value)).toEqual({ kind: 'absent' });
  });

  it('should not alias the stored array', () => {
    const value = ['user'];
    const roles = storedRoleNames(readStoredRoles(value));
    roles.push('admin');

    expect(value).toEqual(['user']);
  });
});

describe('storedRoleNames', () => {
  it('should give no roles for an absent value', () => {
    expect(storedRoleNames({ kind: 'absent' })).toEqual([]);
  });

  it('should give no roles for a mixed sequence without strings', () => {
    expect(storedRoleNames(readStoredRoles([1, true, {}]))).toEqual([]);
  });
});

describe('parseRolesHeader', () => {
  it('should split on commas and trim each role', () => {
    expect(parseRolesHeader(' user , admin')).toEqual(['user', 'admin']);
  });

  it('should keep a single role', () => {
    expect(parseRolesHeader('any')).toEqual(['any']);
  });

  it('should keep empty pieces', () => {
    expect(parseRolesHeader('user,,admin')).toEqual(['user', '', 'admin']);
  });
});
