// ─── SEGMENTS ───

export interface NumericSegment {
  readonly kind: 'numeric';
  readonly value: bigint;
}

export interface OtherSegment {
  readonly kind: 'other';
  readonly value: string;
}

export type Segment = NumericSegment | OtherSegment;

export interface Version {
  readonly repr: string;
  readonly segments: readonly Segment[];
}

const SEPARATORS = /[.\-_+]/;

// Qualifiers below 0 sort before the bare release, above 0 after it.
const QUALIFIER_LEVELS: ReadonlyMap<string, number> = new Map([
  ['alpha', -5],
  ['a', -5],
  ['beta', -4],
  ['b', -4],
  ['milestone', -3],
  ['m', -3],
  ['rc', -2],
  ['cr', -2],
  ['snapshot', -1],
  ['', 0],
  ['ga', 0],
  ['final', 0],
  ['release', 0],
  ['sp', 1],
]);

const UNKNOWN_QUALIFIER_LEVEL = 2;

function qualifierLevel(value: string): number {
  return QUALIFIER_LEVELS.get(value.toLowerCase()) ?? UNKNOWN_QUALIFIER_LEVEL;
}

function sign(n: number | bigint): number {
  if (n > 0) return 1;
  if (n < 0) return -1;
  return 0;
}

// ─── PARSING ───

function splitPart(part: string): Segment[] {
  if (part === '') return [{ kind: 'other', value: '' }];
  const runs = part.match(/\d+|\D+/g) ?? [];
  return runs.map((run): Segment =>
    /^\d/.test(run) ? { kind: 'numeric', value: BigInt(run) } : { kind: 'other', value: run },
  );
}

/**
 * Parse a version string into segments. Total: every string yields a Version.
 *
 * `1.0-rc1` -> [1, 0, "rc", 1]; `.5` -> ["", 5]; `` -> [].
 */
export function parseVersion(repr: string): Version {
  if (repr === '') return { repr, segments: [] };
  const segments = repr.split(SEPARATORS).flatMap(splitPart);
  return { repr, segments };
}

// ─── SEGMENT HELPERS ───

export function isNumericSegment(segment: Segment): segment is NumericSegment {
  return segment.kind === 'numeric';
}

/**
 * Sign of the segment relative to an absent one: `0` and `""` (or `ga`,
 * `final`) count as nothing, pre-release qualifiers as less than nothing.
 */
export function compareToEmpty(segment: Segment): number {
  return segment.kind === 'numeric' ? sign(segment.value) : sign(qualifierLevel(segment.value));
}

export function isEmptySegment(segment: Segment): boolean {
  return compareToEmpty(segment) === 0;
}

export function segmentsEqual(a: Segment, b: Segment): boolean {
  return a.kind === b.kind && a.value === b.value;
}

export function compareSegments(a: Segment, b: Segment): number {
  if (a.kind === 'numeric' && b.kind === 'numeric') return sign(a.value - b.value);
  if (a.kind === 'other' && b.kind === 'other') {
    const byLevel = sign(qualifierLevel(a.value) - qualifierLevel(b.value));
    if (byLevel !== 0) return byLevel;
    const la = a.value.toLowerCase();
    const lb = b.value.toLowerCase();
    if (la !== lb) return la < lb ? -1 : 1;
    if (a.value === b.value) return 0;
    return a.value < b.value ? -1 : 1;
  }
  return a.kind === 'numeric' ? 1 : -1;
}

// ─── SEQUENCES ───

export function segmentListsEqual(a: readonly Segment[], b: readonly Segment[]): boolean {
  return a.length === b.length && a.every((s, i) => {
    const other = b[i];
    return other !== undefined && segmentsEqual(s, other);
  });
}

/**
 * Plain lexicographic order: the first differing segment decides, and a
 * strict prefix sorts first. No padding with empty segments.
 */
export function compareSegmentLists(a: readonly Segment[], b: readonly Segment[]): number {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const x = a[i];
    const y = b[i];
    if (x === undefined || y === undefined) break;
    const c = compareSegments(x, y);
    if (c !== 0) return c;
  }
  return sign(a.length - b.length);
}

/**
 * Total order over versions. A missing trailing segment compares as empty,
 * so `1.0` and `1.0.0` are equal here while `1.0-rc1` sorts before `1.0`.
 */
export function compareVersions(a: Version, b: Version): number {
  const length = Math.max(a.segments.length, b.segments.length);
  for (let i = 0; i < length; i++) {
    const x = a.segments[i];
    const y = b.segments[i];
    let c: number;
    if (x !== undefined && y !== undefined) c = compareSegments(x, y);
    else if (x !== undefined) c = compareToEmpty(x);
    else if (y !== undefined) c = -compareToEmpty(y);
    else c = 0;
    if (c !== 0) return c;
  }
  return 0;
}

/** Structural equality: `1.0` and `1.0.0` are different versions. */
export function versionsEqual(a: Version, b: Version): boolean {
  return segmentListsEqual(a.segments, b.segments);
}

export function renderNumericSegments(segments: readonly NumericSegment[]): string {
  return segments.map(s => s.value.toString()).join('.');
}
