import { describe, it, expect } from 'vitest';

import { compareIds, extractPostId } from '../../parsers/post-id.js';
import { decodeHtmlEntities, stripTags } from '../../parsers/html.js';

describe('extractPostId', () => {
  it('accepts a raw numeric id', () => {
    expect(extractPostId(' 1893456789012345678 ')).toBe('1893456789012345678');
  });

  it('reads the id from status urls', () => {
    expect(extractPostId('https://x.com/newsdesk/status/2001?s=20')).toBe('2001');
    expect(extractPostId('https://mastodon.example/@desk/statuses/77')).toBe('77');
  });

  it('returns null for anything else', () => {
    expect(extractPostId('https://x.com/newsdesk')).toBeNull();
  });
});

describe('compareIds', () => {
  it('compares numeric ids by value', () => {
    expect(compareIds('105', '100')).toBe(1);
    expect(compareIds('100', '105')).toBe(-1);
    expect(compareIds('99', '100')).toBe(-1);
    expect(compareIds('1893456789012345679', '1893456789012345678')).toBe(1);
    expect(compareIds('100', '100')).toBe(0);
  });

  it('falls back to string order for other ids', () => {
    expect(compareIds('3kf2a', '3kf29')).toBe(1);
    expect(compareIds('abc', '100')).toBe(-1 * compareIds('100', 'abc'));
  });
});

describe('html helpers', () => {
  it('decodes named and numeric entities', () => {
    expect(decodeHtmlEntities('&amp; &#39; &#x1F600; &hellip; &unknown;')).toBe("& ' 😀 … &unknown;");
  });

  it('strips tags and collapses whitespace', () => {
    expect(stripTags('<p>One</p>\n<p>Two <b>three</b></p>')).toBe('One Two three');
  });
});
