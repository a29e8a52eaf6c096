/**
 * Classification of role values read from the request-scoped store.
 *
 * The store is untyped, so the raw value is classified once here and the
 * rest of the resolution works on the tagged result.
 */

export type StoredRoles =
  | { kind: 'absent' }
  | { kind: 'strings'; roles: string[] }
  | { kind: 'mixed'; values: unknown[] };

export function readStoredRoles(value: unknown): StoredRoles {
  if (!Array.isArray(value)) {
    return { kind: 'absent' };
  }

  const values: unknown[] = [...value];
  if (values.every((item): item is string => typeof item === 'string')) {
    return { kind: 'strings', roles: values };
  }
  return { kind: 'mixed', values };
}

/**
 * Roles carried by a classified store value. Non-string elements of a mixed
 * sequence are dropped, which may leave the set empty.
 */
export function storedRoleNames(stored: StoredRoles): string[] {
  switch (stored.kind) {
    case 'absent':
      return [];
    case 'strings':
      return [...stored.roles];
    case 'mixed':
      return stored.values.filter((item): item is string => typeof item === 'string');
  }
}
