import type { CombinatorRule, FilterRule, ReplacementRule } from '../types.js';

export type FilterCheck =
  | { pass: true; reason: null }
  | { pass: false; reason: 'banned_phrase' | 'missing_required_keyword' };

const VALID_FLAGS = new Set(['g', 'i', 's', 'u', 'y']);

// Source configs write `m` for "dot matches newline", which RegExp spells `s`.
const FLAG_ALIASES: Record<string, string> = { m: 's' };

/**
 * Keep only flags RegExp accepts, each once. `g` is dropped unless requested.
 */
function sanitizeFlags(flags: string, global: boolean): string {
  const kept = new Set<string>();
  for (const raw of flags.toLowerCase()) {
    const flag = FLAG_ALIASES[raw] ?? raw;
    if (VALID_FLAGS.has(flag) && flag !== 'g') kept.add(flag);
  }
  if (global) kept.add('g');
  return Array.from(kept).join('');
}

function compile(pattern: string, flags: string, global = false): RegExp | null {
  try {
    return new RegExp(pattern, sanitizeFlags(flags, global));
  } catch {
    return null;
  }
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function matchesCombinator(text: string, rule: CombinatorRule): boolean {
  const lower = text.toLowerCase();
  const results: boolean[] = [];

  for (const items of [rule.content, rule.username, rule.domain]) {
    for (const item of items ?? []) {
      results.push(lower.includes(item.toLowerCase()));
    }
  }

  for (const patterns of [rule.contentRegex, rule.usernameRegex, rule.domainRegex]) {
    for (const pattern of patterns ?? []) {
      const regex = compile(pattern, 'i');
      results.push(regex !== null && regex.test(text));
    }
  }

  if (results.length === 0) return false;

  switch (rule.type) {
    case 'and':
      return results.every(Boolean);
    case 'or':
      return results.some(Boolean);
    case 'not':
      return !results.some(Boolean);
  }
}

export function matchesRule(text: string, rule: FilterRule): boolean {
  if (!text) return false;

  if (typeof rule === 'string') {
    return text.toLowerCase().includes(rule.toLowerCase());
  }

  switch (rule.type) {
    case 'literal':
      return text.toLowerCase().includes(rule.pattern.toLowerCase());
    case 'regex': {
      const regex = compile(rule.pattern, rule.flags ?? 'i');
      return regex !== null && regex.test(text);
    }
    case 'and':
    case 'or':
    case 'not':
      return matchesCombinator(text, rule);
    case 'complex': {
      if (rule.rules.length === 0) return false;
      if (rule.operator === 'and') return rule.rules.every((nested) => matchesRule(text, nested));
      if (rule.operator === 'or') return rule.rules.some((nested) => matchesRule(text, nested));
      return false;
    }
  }
}

export function isBanned(text: string, bannedPhrases: FilterRule[]): boolean {
  if (!text || bannedPhrases.length === 0) return false;
  return bannedPhrases.some((rule) => matchesRule(text, rule));
}

/**
 * True when any required rule matches. An empty rule list is always satisfied.
 */
export function hasRequired(text: string, requiredKeywords: FilterRule[]): boolean {
  if (requiredKeywords.length === 0) return true;
  if (!text) return false;
  return requiredKeywords.some((rule) => matchesRule(text, rule));
}

export function checkContent(
  text: string,
  rules: { banned_phrases?: FilterRule[]; required_keywords?: FilterRule[] },
): FilterCheck {
  if (isBanned(text, rules.banned_phrases ?? [])) {
    return { pass: false, reason: 'banned_phrase' };
  }
  if (!hasRequired(text, rules.required_keywords ?? [])) {
    return { pass: false, reason: 'missing_required_keyword' };
  }
  return { pass: true, reason: null };
}

/**
 * Apply each replacement in order. Every rule replaces all occurrences;
 * rules whose pattern does not compile are skipped.
 */
export function applyReplacements(text: string, replacements: ReplacementRule[]): string {
  if (!text || replacements.length === 0) return text;

  let result = text;
  for (const rule of replacements) {
    const source = rule.literal ? escapeRegExp(rule.pattern) : rule.pattern;
    const regex = compile(source, rule.flags ?? 'gi', true);
    if (!regex) continue;
    result = result.replace(regex, rule.replacement ?? '');
  }
  return result;
}
