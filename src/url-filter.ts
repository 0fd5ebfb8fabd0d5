/**
 * Compiles `*`-wildcard URL patterns into anchored, case-sensitive regular
 * expressions. Every other character matches itself.
 *
 * @example
 * ```ts
 * const blacklist = compileBlacklist(['https://ads.example.com/*', '*.woff2']);
 * isBlocked('https://ads.example.com/banner.js', blacklist, new Set()); // true
 * ```
 */
export function compileBlacklist(patterns: readonly string[]): RegExp[] {
  return patterns
    .map(p => p.trim())
    .filter(p => p.length > 0)
    .map(p => new RegExp(`^${p.split('*').map(escapeRegExp).join('.*')}$`));
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * A request is blocked when some pattern matches its full URL and the exact URL
 * was not allow-listed (the conversion's own input and its pre-processed copies).
 */
export function isBlocked(url: string, blacklist: readonly RegExp[], allowList: ReadonlySet<string>): boolean {
  if (allowList.has(url)) return false;
  return blacklist.some(re => re.test(url));
}
