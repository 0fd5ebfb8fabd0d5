import { describe, it, expect } from 'vitest';
import { compileBlacklist, isBlocked } from './url-filter.js';

describe('compileBlacklist', () => {
  it('anchors patterns and expands * only', () => {
    const [re] = compileBlacklist(['https://cdn.example.com/*.js?v=1']);
    expect(re?.source).toBe('^https:\\/\\/cdn\\.example\\.com\\/.*\\.js\\?v=1$');
  });

  it('skips empty patterns', () => {
    expect(compileBlacklist(['', '  ', 'a'])).toHaveLength(1);
  });
});

describe('isBlocked', () => {
  const blacklist = compileBlacklist(['https://ads.example.com/*', '*.woff2']);
  const cases: Array<[string, string[], boolean]> = [
    ['https://ads.example.com/banner.js', [], true],
    ['https://ads.example.com/banner.js', ['https://ads.example.com/banner.js'], false],
    ['https://fonts.example.org/a.woff2', [], true],
    ['https://fonts.example.org/a.woff2?x', [], false],
    ['https://www.example.com/index.html', [], false],
    ['https://www.example.com/index.html', ['https://www.example.com/index.html'], false],
    // case-sensitive
    ['https://ADS.example.com/banner.js', [], false],
    // anchored at the start
    ['http://proxy/?u=https://ads.example.com/x', [], false],
  ];

  it.each(cases)('%s with allow-list %j → %s', (url, allowed, expected) => {
    expect(isBlocked(url, blacklist, new Set(allowed))).toBe(expected);
  });

  it('blocks nothing with an empty blacklist', () => {
    expect(isBlocked('https://anything.example/', [], new Set())).toBe(false);
  });
});
