/**
 * hpikit Engine: Version Ordering
 *
 * Orders module versions the way dependency resolvers for this ecosystem
 * do: versions are split on `.`, `-`, `_` and `+` and at digit/letter
 * boundaries; numeric parts compare numerically, and a numeric part is
 * newer than a qualifier.
 *
 *   1.0 < 1.0.1
 *   1.0-rc1 < 1.0
 *   1.0-SNAPSHOT < 1.0
 *   2.9 < 2.10
 *   1.0 < 1.0-sp1
 */

type VersionPart = number | string;

/**
 * Rank of well-known qualifiers. Unknown qualifiers rank 1 and compare
 * alphabetically among themselves.
 */
const QUALIFIER_RANK: ReadonlyMap<string, number> = new Map([
  ['dev', 0],
  ['rc', 2],
  ['cr', 2],
  ['snapshot', 3],
  ['final', 4],
  ['ga', 4],
  ['release', 4],
  ['sp', 5],
]);

function tokenize(version: string): VersionPart[] {
  const parts: VersionPart[] = [];
  for (const segment of version.split(/[.\-_+]/)) {
    for (const piece of segment.match(/\d+|\D+/g) ?? []) {
      parts.push(/^\d+$/.test(piece) ? Number(piece) : piece.toLowerCase());
    }
  }
  return parts;
}

const RELEASE_RANK = 4;

/** Qualifiers that mark something after the plain release (service packs). */
function isPostRelease(qualifier: string): boolean {
  return (QUALIFIER_RANK.get(qualifier) ?? 1) > RELEASE_RANK;
}

function compareQualifiers(a: string, b: string): number {
  const rankA = QUALIFIER_RANK.get(a) ?? 1;
  const rankB = QUALIFIER_RANK.get(b) ?? 1;
  if (rankA !== rankB) return rankA - rankB;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Compare two versions. Negative when `a` is older than `b`, positive when
 * newer, zero when equivalent.
 */
export function compareVersions(a: string, b: string): number {
  const left = tokenize(a);
  const right = tokenize(b);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const pa = left[i];
    const pb = right[i];
    if (pa === undefined) {
      if (pb === undefined) return 0;
      // 1.0 vs 1.0.1 → older; 1.0 vs 1.0-rc1 → newer; 1.0 vs 1.0-sp1 → older
      return typeof pb === 'number' || isPostRelease(pb) ? -1 : 1;
    }
    if (pb === undefined) {
      return typeof pa === 'number' || isPostRelease(pa) ? 1 : -1;
    }
    if (typeof pa === 'number' && typeof pb === 'number') {
      if (pa !== pb) return pa - pb;
      continue;
    }
    if (typeof pa === 'number') return 1;
    if (typeof pb === 'number') return -1;
    const q = compareQualifiers(pa, pb);
    if (q !== 0) return q;
  }
  return 0;
}

/** The newest of two versions; `a` when they are equivalent. */
export function newerVersion(a: string, b: string): string {
  return compareVersions(a, b) >= 0 ? a : b;
}
