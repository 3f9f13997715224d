/**
 * Port: OriginMatcher — decides whether a request `Origin` may proceed.
 * Chosen once when a policy is compiled; never swapped afterwards.
 */
export const OriginMatcherKind = {
  PREDICATE: "predicate",
  ANY: "any",
  LISTED: "listed",
} as const;

export type OriginMatcherKind = (typeof OriginMatcherKind)[keyof typeof OriginMatcherKind];

export interface OriginMatcher {
  readonly kind: OriginMatcherKind;
  admits(origin: string): boolean;
}
