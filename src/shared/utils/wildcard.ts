/**
 * Two-anchor origin pattern, e.g. `https://*.example.com` →
 * `{ prefix: "https://", suffix: ".example.com" }`.
 */
export interface Wildcard {
  readonly prefix: string;
  readonly suffix: string;
}

/**
 * Split a pattern at its first `*`. Any later `*` stays in the suffix as a
 * literal character.
 */
export const wildcardFromPattern = (pattern: string): Wildcard | null => {
  const i = pattern.indexOf("*");
  if (i < 0) return null;
  return { prefix: pattern.slice(0, i), suffix: pattern.slice(i + 1) };
};

export const matchWildcard = (w: Wildcard, candidate: string): boolean =>
  candidate.length >= w.prefix.length + w.suffix.length &&
  candidate.startsWith(w.prefix) &&
  candidate.endsWith(w.suffix);
