import { z } from 'zod';

/**
 * Zod schemas for policy-table files
 */

const PolicyRuleSchema = z.object({
  role: z.string().min(1, 'Rule role is required'),
  resource: z.string().min(1, 'Rule resource is required'),
  actions: z.array(z.string().min(1)).min(1, 'At least one action is required'),
});

const RoleDefinitionSchema = z.object({
  inherits: z.array(z.string().min(1)).default([]),
});

export const PolicyTableSchema = z.object({
  roles: z.record(RoleDefinitionSchema).default({}),
  rules: z.array(PolicyRuleSchema).min(1, 'At least one rule is required'),
});

export type PolicyRule = z.infer<typeof PolicyRuleSchema>;
export type PolicyTable = z.infer<typeof PolicyTableSchema>;
/** Input shape, before defaults are applied */
export type PolicyTableInput = z.input<typeof PolicyTableSchema>;
