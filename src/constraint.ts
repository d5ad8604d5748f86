import type { Segment, Version } from './version.js';
import { parseVersion } from './version.js';
import type { VersionInterval } from './interval.js';
import { ZERO_INTERVAL, isValidInterval } from './interval.js';

/**
 * A parsed constraint. When `interval` is ZERO_INTERVAL the preferred
 * versions drive matching; otherwise the interval alone does.
 */
export interface VersionConstraint {
  readonly preferred: readonly Version[];
  readonly interval: VersionInterval;
}

const NOTHING: VersionConstraint = { preferred: [], interval: ZERO_INTERVAL };

const INTERVAL = /^([[(])([^,]*?)(?:,([^,]*?))?([\])])$/;

function parseInterval(input: string): VersionConstraint {
  const match = INTERVAL.exec(input);
  if (!match) return NOTHING;
  const [, open = '', rawFrom = '', rawTo, close = ''] = match;
  const from = rawFrom.trim();

  let interval: VersionInterval;
  if (rawTo === undefined) {
    // `[1.0]` pins one version; `(1.0)` means nothing
    if (open !== '[' || close !== ']' || from === '') return NOTHING;
    const pinned = parseVersion(from);
    interval = { from: pinned, to: pinned, fromIncluded: true, toIncluded: true };
  } else {
    const to = rawTo.trim();
    interval = {
      from: from === '' ? undefined : parseVersion(from),
      to: to === '' ? undefined : parseVersion(to),
      fromIncluded: open === '[',
      toIncluded: close === ']',
    };
  }

  return isValidInterval(interval) ? { preferred: [], interval } : NOTHING;
}

function bumpLast(segments: readonly Segment[]): Segment[] | null {
  const last = segments[segments.length - 1];
  if (last === undefined || last.kind !== 'numeric') return null;
  return [...segments.slice(0, -1), { kind: 'numeric', value: last.value + 1n }];
}

// `1.2+` and `1.2.+` cover [1.2, 1.3)
function parsePrefix(input: string): VersionConstraint | null {
  const prefix = input.slice(0, -1).replace(/[.\-_]+$/, '');
  if (prefix === '') {
    return { preferred: [], interval: { fromIncluded: false, toIncluded: false } };
  }
  const from = parseVersion(prefix);
  const upper = bumpLast(from.segments);
  if (upper === null) return null;
  const to: Version = { repr: upper.map(s => s.value.toString()).join('.'), segments: upper };
  return { preferred: [], interval: { from, to, fromIncluded: true, toIncluded: false } };
}

/**
 * Parse a raw constraint string. Total: malformed input yields a constraint
 * that matches nothing.
 */
export function parseVersionConstraint(input: string): VersionConstraint {
  const trimmed = input.trim();
  if (trimmed === '') return NOTHING;

  if (trimmed.startsWith('[') || trimmed.startsWith('(')) {
    return parseInterval(trimmed);
  }

  if (trimmed.endsWith('+')) {
    const prefixed = parsePrefix(trimmed);
    if (prefixed !== null) return prefixed;
  }

  return { preferred: [parseVersion(trimmed)], interval: ZERO_INTERVAL };
}
