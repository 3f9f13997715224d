/**
 * Header-name helpers shared by the policy compiler and the negotiation
 * service. Pure string work, no allocation beyond the returned values.
 */

/** RFC 7230 `tchar` set — anything else makes a name non-canonicalizable. */
const isTokenChar = (c: string): boolean => /^[!#$%&'*+\-.^_`|~0-9A-Za-z]$/.test(c);

/**
 * Canonical header-name case: `content-type` → `Content-Type`.
 * Names carrying a space or a non-token character are returned as given.
 */
export const canonicalHeaderKey = (name: string): string => {
  for (const c of name) {
    if (!isTokenChar(c)) return name;
  }

  let out = "";
  let upper = true;
  for (const c of name) {
    out += upper ? c.toUpperCase() : c.toLowerCase();
    upper = c === "-";
  }
  return out;
};

/** Order- and length-preserving map over a string list. */
export const convert = (
  list: readonly string[],
  transform: (s: string) => string,
): string[] => list.map((s) => transform(s));

const trimAscii = (s: string): string => s.replace(/^[ \t\r\n\f\v]+|[ \t\r\n\f\v]+$/g, "");

/**
 * Parse a comma-separated header-name list such as the value of
 * `Access-Control-Request-Headers`.
 *
 *   parseHeaderList("x-a, X-B ,,x-a") → ["X-A", "X-B"]
 */
export const parseHeaderList = (raw: string): string[] => {
  const seen = new Set<string>();
  const headers: string[] = [];

  for (const part of raw.split(",")) {
    const token = trimAscii(part);
    if (token === "") continue;
    const name = canonicalHeaderKey(token);
    if (seen.has(name)) continue;
    seen.add(name);
    headers.push(name);
  }

  return headers;
};
