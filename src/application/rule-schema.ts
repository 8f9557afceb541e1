import { z } from 'zod';
import type { Rule } from '../domain/index.js';
import { ACTION_TYPES, CONDITION_OPERATORS, CONDITION_TYPES } from '../domain/index.js';
import { propertyValueSchema } from './event-schema.js';

/**
 * Zod schema for a single rule condition.
 *
 * `logical_operator` joins this condition to the next one; absent means `and`.
 */
export const conditionSchema = z.object({
  type: z.enum(CONDITION_TYPES),
  property: z.string().min(1),
  operator: z.enum(CONDITION_OPERATORS),
  value: propertyValueSchema,
  logical_operator: z.enum(['and', 'or']).optional(),
});

export const ruleActionSchema = z.object({
  type: z.enum(ACTION_TYPES),
  parameters: z.record(z.string(), propertyValueSchema).default({}),
});

export const ruleSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).max(255),
  conditions: z.array(conditionSchema).default([]),
  actions: z.array(ruleActionSchema).default([]),
  priority: z.number().int().default(0),
  is_active: z.boolean().default(true),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export type RuleInput = z.input<typeof ruleSchema>;

/**
 * Body of `GET /rules`.
 *
 * Individual rules are validated separately so one malformed rule does not
 * discard the whole response.
 */
export const rulesResponseSchema = z.object({
  rules: z.array(z.unknown()),
  version: z.union([z.string(), z.number()]).optional(),
  timestamp: z.union([z.string(), z.number()]).optional(),
});

export type RulesResponse = z.infer<typeof rulesResponseSchema>;

export interface ParsedRules {
  readonly rules: Rule[];
  readonly rejected: number;
}

/** Validates each raw rule, keeping the valid ones in their original order. */
export function parseRules(raw: readonly unknown[]): ParsedRules {
  const rules: Rule[] = [];
  let rejected = 0;
  for (const candidate of raw) {
    const parsed = ruleSchema.safeParse(candidate);
    if (parsed.success) {
      rules.push(parsed.data);
    } else {
      rejected++;
    }
  }
  return { rules, rejected };
}
