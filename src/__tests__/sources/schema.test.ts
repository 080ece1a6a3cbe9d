import { describe, it, expect } from 'vitest';

import { filterRuleSchema, parseSourceConfig } from '../../sources/schema.js';

describe('filterRuleSchema', () => {
  it('accepts plain strings', () => {
    expect(filterRuleSchema.parse('giveaway')).toBe('giveaway');
  });

  it('renames snake_case regex lists', () => {
    expect(filterRuleSchema.parse({ type: 'and', content: ['vote'], content_regex: ['poll\\w*'] })).toEqual({
      type: 'and',
      content: ['vote'],
      contentRegex: ['poll\\w*'],
    });
  });

  it('reads a pattern with an unknown type as a literal', () => {
    expect(filterRuleSchema.parse({ type: 'glob', pattern: 'promo*' })).toEqual({ type: 'literal', pattern: 'promo*' });
  });

  it('parses nested complex rules', () => {
    const rule = {
      type: 'complex',
      operator: 'or',
      rules: ['budget', { type: 'regex', pattern: 'council', flags: 'i' }, { type: 'not', domain_regex: ['ads\\.'] }],
    };

    expect(filterRuleSchema.parse(rule)).toEqual({
      type: 'complex',
      operator: 'or',
      rules: ['budget', { type: 'regex', pattern: 'council', flags: 'i' }, { type: 'not', domainRegex: ['ads\\.'] }],
    });
  });

  it('rejects an unknown type without a pattern', () => {
    expect(filterRuleSchema.safeParse({ type: 'glob' }).success).toBe(false);
  });
});

describe('parseSourceConfig', () => {
  it('returns a typed config', () => {
    const config = parseSourceConfig({
      id: 'newsdesk_twitter',
      platform: 'twitter',
      filtering: { skip_replies: true, banned_phrases: ['giveaway'] },
      processing: { trim_strategy: 'word', max_length: 400 },
      target: { visibility: 'unlisted' },
    });

    expect(config).toEqual({
      id: 'newsdesk_twitter',
      platform: 'twitter',
      filtering: { skip_replies: true, banned_phrases: ['giveaway'] },
      processing: { trim_strategy: 'word', max_length: 400 },
      target: { visibility: 'unlisted' },
    });
  });

  it('lists every problem with its path', () => {
    expect(() =>
      parseSourceConfig({ id: 'desk', platform: 'myspace', processing: { max_length: -5 } }),
    ).toThrow(
      "Invalid source config desk:\n  platform: Invalid enum value. Expected 'twitter' | 'bluesky' | 'rss' | 'youtube', received 'myspace'\n  processing.max_length: Number must be greater than 0",
    );
  });

  it('names an unknown source when the id is missing', () => {
    expect(() => parseSourceConfig({ platform: 'rss' })).toThrow('Invalid source config (unknown):\n  id: Required');
  });

  it('rejects a replacement without a pattern', () => {
    expect(() =>
      parseSourceConfig({ id: 'desk', platform: 'rss', processing: { content_replacements: [{ pattern: '' }] } }),
    ).toThrow('processing.content_replacements.0.pattern');
  });
});
