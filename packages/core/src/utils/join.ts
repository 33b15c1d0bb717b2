/**
 * Join non-empty fragments with a separator
 */
export function joinFragments(fragments: readonly string[], separator: string): string {
  return fragments.filter((fragment) => fragment.length > 0).join(separator);
}

/**
 * Prefix joined fragments with a clause keyword, or return `''` when nothing is left
 */
export function prefixClause(
  keyword: string,
  fragments: readonly string[],
  separator: string,
): string {
  const body = joinFragments(fragments, separator);
  return body ? `${keyword} ${body}` : '';
}
