/**
 * Default roles header parser: comma-separated, each piece trimmed.
 *
 * Empty pieces are kept (`"a,,b"` gives `['a', '', 'b']`); an empty role
 * simply never matches a policy.
 */
export function parseRolesHeader(header: string): string[] {
  return header.split(',').map((role) => role.trim());
}
