import type { TrimStrategy } from '../types.js';

export const TRIM_STRATEGIES: readonly TrimStrategy[] = ['sentence', 'word', 'smart', 'hard'];

export const DEFAULT_MAX_LENGTH = 500;
export const DEFAULT_TOLERANCE_PERCENT = 12;

export interface TrimOptions {
  maxLength?: number;
  strategy?: string;
  /** Width of the window below the limit in which a sentence boundary is preferred. Clamped to 5..25. */
  tolerancePercent?: number;
}

const SENTENCE_END_RE = /[.!?]+(?=\s|$)/g;
const URL_AT_END_RE = /https?:\/\/\S*$/;
const ABBREVIATION_AT_END_RE = /\b[A-Z]\.$/;

function resolveStrategy(strategy: string | undefined): TrimStrategy {
  return TRIM_STRATEGIES.find((known) => known === strategy) ?? 'smart';
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function normalizeText(text: string): string {
  return text
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .replace(/\n +/g, '\n')
    .replace(/ +\n/g, '\n')
    .replace(/\.{3,}/g, '…')
    .replace(/…{2,}/g, '…')
    .trim();
}

/**
 * Remove link debris left at the end of a cut: a URL with no usable domain,
 * or a trailing sentence fragment after the last URL.
 */
export function cleanUrlArtifacts(text: string): string {
  const trailing = text.match(/(https?:\/\/\S+)$/);
  if (trailing) {
    const url = trailing[1];
    const body = url.replace(/^https?:\/\//, '');
    if (!body.includes('.') || /\.[a-z]?$/i.test(body)) {
      return text.slice(0, text.lastIndexOf(url)).trimEnd();
    }
  }

  const followed = text.match(/(https?:\/\/\S+)\s+(\S.*)/);
  if (followed && followed.index !== undefined && !/[.!?]$/.test(followed[2])) {
    return text.slice(0, followed.index + followed[1].length);
  }

  return text;
}

function trimHard(text: string, maxLength: number): string {
  return text.slice(0, maxLength - 1) + '…';
}

function trimByWord(text: string, maxLength: number): string {
  const target = maxLength - 1;
  const truncated = text.slice(0, target);
  const lastSpace = truncated.lastIndexOf(' ');

  const result = lastSpace > target * 0.7 ? truncated.slice(0, lastSpace) : truncated;
  return cleanUrlArtifacts(result).trimEnd() + '…';
}

function trimBySentence(text: string, maxLength: number): string {
  const target = maxLength - 1;
  const sentences = text.match(/[^.!?]+[.!?]+/g) ?? [];

  let result = '';
  for (const sentence of sentences) {
    if ((result + sentence).length > target) break;
    result += sentence;
  }

  if (!result || result.length < target * 0.5) {
    return trimByWord(text, maxLength);
  }
  return result.trim();
}

function trimSmart(text: string, maxLength: number, tolerancePercent: number): string {
  const target = maxLength - 1;
  const tolerance = Math.floor((maxLength * tolerancePercent) / 100);
  const minLength = target - tolerance;

  let lastInWindow: number | null = null;
  let best: number | null = null;

  for (const match of text.slice(0, target).matchAll(SENTENCE_END_RE)) {
    const end = (match.index ?? 0) + match[0].length;
    const preceding = text.slice(0, end);
    if (URL_AT_END_RE.test(preceding)) continue;
    if (ABBREVIATION_AT_END_RE.test(preceding)) continue;

    best = end;
    if (end >= minLength && end <= target) lastInWindow = end;
  }

  const chosen = lastInWindow ?? (best !== null && best > target * 0.7 ? best : null);
  if (chosen === null) return trimByWord(text, maxLength);

  let result = cleanUrlArtifacts(text.slice(0, chosen).trim());
  if (chosen < text.length && result.length + 2 <= maxLength) {
    result += ' …';
  }
  return result;
}

/**
 * Normalize whitespace and ellipses, then cut the text to `maxLength` characters
 * with the chosen strategy. Text within the budget is only normalized.
 */
export function trimText(text: string, options: TrimOptions = {}): string {
  if (!text) return '';

  const maxLength = Math.max(options.maxLength ?? DEFAULT_MAX_LENGTH, 1);
  const strategy = resolveStrategy(options.strategy);
  const tolerancePercent = clamp(options.tolerancePercent ?? DEFAULT_TOLERANCE_PERCENT, 5, 25);

  const normalized = normalizeText(text);
  if (normalized.length <= maxLength) return normalized;

  switch (strategy) {
    case 'sentence':
      return trimBySentence(normalized, maxLength);
    case 'word':
      return trimByWord(normalized, maxLength);
    case 'smart':
      return trimSmart(normalized, maxLength, tolerancePercent);
    case 'hard':
      return trimHard(normalized, maxLength);
  }
}
