/**
 * Version normalization and comparison for dependency declarations.
 */

/**
 * Reduce a declared version to a plain version string.
 * "^4.17.20" -> "4.17.20", ">=1.2, <2" -> "1.2", "1.0 || 2.0" -> "1.0".
 */
export function normalizeVersion(raw: string): string {
  let version = raw.trim().replace(/^[\^~><=!\s]+/, "");
  const comma = version.indexOf(",");
  if (comma !== -1) version = version.slice(0, comma);
  const alt = version.indexOf("||");
  if (alt !== -1) version = version.slice(0, alt);
  return version.trim();
}

/**
 * Numeric segments of a version, or null when the version does not start
 * with a number. Trailing non-numeric parts of a segment are ignored
 * ("2.0.0-beta" -> [2, 0, 0]).
 */
export function parseVersion(version: string): number[] | null {
  if (!/^\d/.test(version)) {
    return null;
  }
  const segments: number[] = [];
  for (const part of version.split(".")) {
    const match = /^\d+/.exec(part);
    if (!match) break;
    segments.push(Number(match[0]));
  }
  return segments;
}

export function compareVersions(a: number[], b: number[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

/**
 * Whether a version falls in an affected range. Supported constraints are
 * `<X`, `<=X` and `=X`; anything unparseable is not a match.
 */
export function satisfiesConstraint(version: string, constraint: string): boolean {
  const parsed = parseVersion(normalizeVersion(version));
  const match = /^(<=|<|=)\s*(.+)$/.exec(constraint.trim());
  if (!parsed || !match) {
    return false;
  }
  const bound = parseVersion(match[2]);
  if (!bound) {
    return false;
  }
  const cmp = compareVersions(parsed, bound);
  switch (match[1]) {
    case "<":
      return cmp < 0;
    case "<=":
      return cmp <= 0;
    default:
      return cmp === 0;
  }
}
