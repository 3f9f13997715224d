import { type OriginMatcher, OriginMatcherKind } from "../../core/ports/origin-matcher.js";
import { type Wildcard, matchWildcard } from "../../shared/utils/wildcard.js";

/** Caller-supplied check; overrides every other origin setting. */
export const predicateOrigins = (fn: (origin: string) => boolean): OriginMatcher => ({
  kind: OriginMatcherKind.PREDICATE,
  admits: (origin) => fn(origin),
});

export const anyOrigin: OriginMatcher = Object.freeze({
  kind: OriginMatcherKind.ANY,
  admits: () => true,
});

/**
 * Exact origins (lower-cased) plus wildcard patterns. The candidate is
 * lower-cased before comparison.
 */
export const listedOrigins = (
  exact: readonly string[],
  wildcards: readonly Wildcard[],
): OriginMatcher => {
  const exactSet: ReadonlySet<string> = new Set(exact);
  const patterns = Object.freeze([...wildcards]);

  return Object.freeze({
    kind: OriginMatcherKind.LISTED,
    admits: (origin: string) => {
      const candidate = origin.toLowerCase();
      if (exactSet.has(candidate)) return true;
      return patterns.some((w) => matchWildcard(w, candidate));
    },
  });
};
