import { z } from 'zod';

import { PLATFORMS } from '../types.js';
import type { ComplexRule, FilterRule, SourceConfig } from '../types.js';

const RULE_TYPES: readonly string[] = ['literal', 'regex', 'and', 'or', 'not', 'complex'];

const CAMEL_CASE_KEYS = new Map([
  ['content_regex', 'contentRegex'],
  ['username_regex', 'usernameRegex'],
  ['domain_regex', 'domainRegex'],
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Source files are hand-written YAML/JSON, so rule objects arrive with snake_case keys
 * and occasionally with a type we do not know. A rule with a pattern but an unknown
 * type is read as a literal.
 */
function normalizeRule(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;

  const rule: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    rule[CAMEL_CASE_KEYS.get(key) ?? key] = value;
  }

  const known = typeof rule.type === 'string' && RULE_TYPES.includes(rule.type);
  if (!known && typeof rule.pattern === 'string') {
    return { type: 'literal', pattern: rule.pattern };
  }
  return rule;
}

const stringList = z.array(z.string());

const literalRuleSchema = z.object({ type: z.literal('literal'), pattern: z.string() });

const regexRuleSchema = z.object({
  type: z.literal('regex'),
  pattern: z.string(),
  flags: z.string().optional(),
});

const combinatorRuleSchema = z.object({
  type: z.enum(['and', 'or', 'not']),
  content: stringList.optional(),
  username: stringList.optional(),
  domain: stringList.optional(),
  contentRegex: stringList.optional(),
  usernameRegex: stringList.optional(),
  domainRegex: stringList.optional(),
});

const complexRuleSchema: z.ZodType<ComplexRule, z.ZodTypeDef, unknown> = z.object({
  type: z.literal('complex'),
  rules: z.array(z.lazy(() => filterRuleSchema)),
  operator: z.string().optional(),
});

export const filterRuleSchema: z.ZodType<FilterRule, z.ZodTypeDef, unknown> = z.preprocess(
  normalizeRule,
  z.union([z.string(), literalRuleSchema, regexRuleSchema, combinatorRuleSchema, complexRuleSchema]),
);

const replacementRuleSchema = z.object({
  pattern: z.string().min(1),
  replacement: z.string().optional(),
  flags: z.string().optional(),
  literal: z.boolean().optional(),
});

const maxLength = z.number().int().positive();

export const sourceConfigSchema = z.object({
  id: z.string().min(1),
  platform: z.enum(PLATFORMS),
  enabled: z.boolean().optional(),
  filtering: z
    .object({
      skip_replies: z.boolean().optional(),
      skip_self_replies: z.boolean().optional(),
      skip_retweets: z.boolean().optional(),
      skip_quotes: z.boolean().optional(),
      banned_phrases: z.array(filterRuleSchema).optional(),
      required_keywords: z.array(filterRuleSchema).optional(),
    })
    .optional(),
  processing: z
    .object({
      trim_strategy: z.enum(['sentence', 'word', 'smart', 'hard']).optional(),
      smart_tolerance_percent: z.number().optional(),
      max_length: maxLength.optional(),
      content_replacements: z.array(replacementRuleSchema).optional(),
      url_domain_fixes: stringList.optional(),
    })
    .optional(),
  formatting: z.object({ max_length: maxLength.optional(), prefix_video: z.string().optional() }).optional(),
  truncation: z.object({ max_length: maxLength.optional() }).optional(),
  thread_handling: z.object({ enabled: z.boolean().optional() }).optional(),
  nitter_processing: z.object({ enabled: z.boolean().optional() }).optional(),
  target: z.object({ visibility: z.enum(['public', 'unlisted', 'private', 'direct']).optional() }).optional(),
});

/**
 * Validate a parsed source file. Throws with one line per problem.
 */
export function parseSourceConfig(input: unknown): SourceConfig {
  const result = sourceConfigSchema.safeParse(input);
  if (!result.success) {
    const id = isRecord(input) && typeof input.id === 'string' ? input.id : '(unknown)';
    const problems = result.error.issues.map(i => `  ${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid source config ${id}:\n${problems}`);
  }
  return result.data;
}
