import { parse as parseYaml } from 'yaml';
import type { Enforcer } from '../types';
import { matchesMethod, matchesResourcePattern } from '../utils/pattern-matching';
import { PolicyParseError } from './errors';
import { PolicyTableSchema, type PolicyRule, type PolicyTable, type PolicyTableInput } from './schema';

/**
 * Policy Table Enforcer
 *
 * In-process enforcer over a flat list of allow rules. A subject is granted
 * when it, or a role it inherits from, has a rule whose resource pattern
 * matches the object and whose actions include the method.
 *
 * Immutable after construction, so concurrent queries need no locking.
 */
export class PolicyTableEnforcer implements Enforcer {
  private readonly rulesByRole: Map<string, PolicyRule[]>;
  private readonly inheritance: Map<string, string[]>;

  constructor(table: PolicyTable) {
    this.rulesByRole = new Map();
    for (const rule of table.rules) {
      const rules = this.rulesByRole.get(rule.role) ?? [];
      rules.push(rule);
      this.rulesByRole.set(rule.role, rules);
    }

    this.inheritance = new Map(
      Object.entries(table.roles).map(([role, definition]) => [role, definition.inherits])
    );
    assertNoInheritanceCycle(this.inheritance);
  }

  /**
   * Build from a plain object, validating it first.
   */
  static fromObject(input: unknown, source?: string): PolicyTableEnforcer {
    const result = PolicyTableSchema.safeParse(input);
    if (!result.success) {
      throw new PolicyParseError(
        'Policy table validation failed',
        result.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
        source,
      );
    }
    return new PolicyTableEnforcer(result.data);
  }

  /**
   * Build from YAML (JSON is valid YAML too).
   */
  static fromYaml(content: string, source?: string): PolicyTableEnforcer {
    let parsed: unknown;
    try {
      parsed = parseYaml(content);
    } catch (error) {
      throw new PolicyParseError(
        `Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`,
        [{ path: '', message: 'Invalid YAML syntax' }],
        source,
      );
    }
    return PolicyTableEnforcer.fromObject(parsed, source);
  }

  static of(input: PolicyTableInput): PolicyTableEnforcer {
    return PolicyTableEnforcer.fromObject(input);
  }

  enforce(subject: string, object: string, action: string): boolean {
    for (const role of this.effectiveRoles(subject)) {
      const rules = this.rulesByRole.get(role) ?? [];
      const granted = rules.some(
        (rule) =>
          matchesResourcePattern(rule.resource, object) &&
          rule.actions.some((pattern) => matchesMethod(pattern, action))
      );
      if (granted) {
        return true;
      }
    }
    return false;
  }

  /**
   * The subject followed by every role it inherits from, breadth-first.
   */
  effectiveRoles(subject: string): string[] {
    const seen = new Set<string>([subject]);
    const queue = [subject];

    for (let i = 0; i < queue.length; i++) {
      for (const parent of this.inheritance.get(queue[i]) ?? []) {
        if (!seen.has(parent)) {
          seen.add(parent);
          queue.push(parent);
        }
      }
    }
    return queue;
  }

  get ruleCount(): number {
    let count = 0;
    for (const rules of this.rulesByRole.values()) {
      count += rules.length;
    }
    return count;
  }
}

function assertNoInheritanceCycle(inheritance: Map<string, string[]>): void {
  const visiting = new Set<string>();
  const done = new Set<string>();

  const visit = (role: string, path: string[]): void => {
    if (done.has(role)) return;
    if (visiting.has(role)) {
      const cycle = [...path.slice(path.indexOf(role)), role].join(' -> ');
      throw new PolicyParseError(`Role inheritance cycle: ${cycle}`, [
        { path: `roles.${role}.inherits`, message: `cycle ${cycle}` },
      ]);
    }

    visiting.add(role);
    for (const parent of inheritance.get(role) ?? []) {
      visit(parent, [...path, role]);
    }
    visiting.delete(role);
    done.add(role);
  };

  for (const role of inheritance.keys()) {
    visit(role, []);
  }
}
