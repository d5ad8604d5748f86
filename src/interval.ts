import type { Version } from './version.js';
import { compareVersions } from './version.js';

export interface VersionInterval {
  readonly from?: Version;
  readonly to?: Version;
  readonly fromIncluded: boolean;
  readonly toIncluded: boolean;
}

/**
 * "No range given" marker. Compared by identity: a parsed `(,)` is a real,
 * unbounded interval and is not zero.
 */
export const ZERO_INTERVAL: VersionInterval = Object.freeze({
  fromIncluded: false,
  toIncluded: false,
});

export function isZeroInterval(interval: VersionInterval): boolean {
  return interval === ZERO_INTERVAL;
}

export function isValidInterval(interval: VersionInterval): boolean {
  if (interval.from === undefined || interval.to === undefined) return true;
  const c = compareVersions(interval.from, interval.to);
  return c < 0 || (c === 0 && interval.fromIncluded && interval.toIncluded);
}

export function intervalContains(interval: VersionInterval, version: Version): boolean {
  if (interval.from !== undefined) {
    const c = compareVersions(interval.from, version);
    if (c > 0 || (c === 0 && !interval.fromIncluded)) return false;
  }
  if (interval.to !== undefined) {
    const c = compareVersions(version, interval.to);
    if (c > 0 || (c === 0 && !interval.toIncluded)) return false;
  }
  return true;
}
