import type { PolicyKind } from './policies.js';
import { POLICY_KINDS } from './policies.js';
import type { NumericSegment, Segment, Version } from './version.js';
import {
  compareSegmentLists,
  compareVersions,
  isEmptySegment,
  isNumericSegment,
  parseVersion,
  renderNumericSegments,
  segmentListsEqual,
  versionsEqual,
} from './version.js';
import { parseVersionConstraint } from './constraint.js';
import { intervalContains, isZeroInterval } from './interval.js';

/**
 * A reconciliation strategy for dependency conflicts. One frozen instance
 * per kind, see COMPATIBILITY.
 */
export interface VersionCompatibility {
  readonly kind: PolicyKind;
  /** Diagnostic label, not a configuration token. */
  readonly name: string;
  isCompatible(constraint: string, version: string): boolean;
  minimumCompatibleVersion(version: string): string;
}

// ─── SHARED RULES ───

type PreferredMatch = (wanted: Version, version: Version) => boolean;

/**
 * Raw equality short-circuits. A range constraint is decided by the range;
 * otherwise `matches` must hold for at least one preferred version.
 */
function matchConstraint(constraint: string, version: string, matches: PreferredMatch): boolean {
  if (constraint === version) return true;
  const c = parseVersionConstraint(constraint);
  const v = parseVersion(version);
  if (!isZeroInterval(c.interval)) return intervalContains(c.interval, v);
  return c.preferred.some(wanted => matches(wanted, v));
}

function allNumeric(segments: readonly Segment[]): segments is readonly NumericSegment[] {
  return segments.every(isNumericSegment);
}

/**
 * `wanted` agrees with `version` on the first `length` segments and is not
 * newer than it on the rest.
 */
function anchoredNotNewer(wanted: Version, version: Version, length: number): boolean {
  return (
    allNumeric(wanted.segments) &&
    segmentListsEqual(wanted.segments.slice(0, length), version.segments.slice(0, length)) &&
    compareSegmentLists(wanted.segments.slice(length), version.segments.slice(length)) <= 0
  );
}

/**
 * Render the first `length` segments of `version` as a plain dotted version
 * and keep it when it does not sort above `version`. Falls back to `version`.
 */
function minimumFromPrefix(
  version: string,
  length: number,
  accept: (prefix: readonly Segment[]) => boolean = () => true,
): string {
  const v = parseVersion(version);
  const prefix = v.segments.slice(0, length);
  if (!accept(prefix) || !allNumeric(prefix)) return version;
  const candidate = renderNumericSegments(prefix);
  return compareVersions(parseVersion(candidate), v) <= 0 ? candidate : version;
}

// `0.x` and leading-separator versions anchor on two segments
function significantPrefixLength(version: Version): number {
  const first = version.segments[0];
  return first !== undefined && isEmptySegment(first) ? 2 : 1;
}

function hasMeaningfulMajor(segments: readonly Segment[]): boolean {
  const major = segments[0];
  return major !== undefined && !isEmptySegment(major);
}

// ─── DISPATCH ───

export function policyName(kind: PolicyKind): string {
  switch (kind) {
    case POLICY_KINDS.ALWAYS:
      return 'always compatible';
    case POLICY_KINDS.STRICT:
      return 'strict';
    case POLICY_KINDS.SEMVER_SPEC:
      return 'strict semantic versioning';
    case POLICY_KINDS.EARLY_SEMVER:
    case POLICY_KINDS.SEMVER:
      return 'early semantic versioning';
    case POLICY_KINDS.DEFAULT:
    case POLICY_KINDS.PACK_VER:
      return 'package versioning policy';
    default: {
      const _exhaustive: never = kind;
      return String(_exhaustive);
    }
  }
}

export function isCompatible(kind: PolicyKind, constraint: string, version: string): boolean {
  switch (kind) {
    case POLICY_KINDS.DEFAULT:
      return isCompatible(POLICY_KINDS.PACK_VER, constraint, version);
    case POLICY_KINDS.SEMVER:
      return isCompatible(POLICY_KINDS.EARLY_SEMVER, constraint, version);
    case POLICY_KINDS.ALWAYS:
      return true;
    case POLICY_KINDS.STRICT:
      return matchConstraint(constraint, version, versionsEqual);
    case POLICY_KINDS.EARLY_SEMVER:
      return matchConstraint(constraint, version, (wanted, v) =>
        anchoredNotNewer(wanted, v, significantPrefixLength(v)),
      );
    case POLICY_KINDS.SEMVER_SPEC:
      return matchConstraint(constraint, version, (wanted, v) =>
        hasMeaningfulMajor(v.segments) && anchoredNotNewer(wanted, v, 1),
      );
    case POLICY_KINDS.PACK_VER:
      return matchConstraint(constraint, version, (wanted, v) =>
        segmentListsEqual(wanted.segments.slice(0, 2), v.segments.slice(0, 2)),
      );
    default: {
      const _exhaustive: never = kind;
      return _exhaustive;
    }
  }
}

export function minimumCompatibleVersion(kind: PolicyKind, version: string): string {
  switch (kind) {
    case POLICY_KINDS.DEFAULT:
      return minimumCompatibleVersion(POLICY_KINDS.PACK_VER, version);
    case POLICY_KINDS.SEMVER:
      return minimumCompatibleVersion(POLICY_KINDS.EARLY_SEMVER, version);
    case POLICY_KINDS.ALWAYS:
      return '0';
    case POLICY_KINDS.STRICT:
      return version;
    case POLICY_KINDS.EARLY_SEMVER:
      return minimumFromPrefix(version, significantPrefixLength(parseVersion(version)));
    case POLICY_KINDS.SEMVER_SPEC:
      return minimumFromPrefix(version, 1, hasMeaningfulMajor);
    case POLICY_KINDS.PACK_VER:
      return minimumFromPrefix(version, 2);
    default: {
      const _exhaustive: never = kind;
      return _exhaustive;
    }
  }
}

// ─── SINGLETONS ───

function define(kind: PolicyKind): VersionCompatibility {
  return Object.freeze({
    kind,
    name: policyName(kind),
    isCompatible: (constraint: string, version: string) => isCompatible(kind, constraint, version),
    minimumCompatibleVersion: (version: string) => minimumCompatibleVersion(kind, version),
  });
}

export const COMPATIBILITY = Object.freeze({
  DEFAULT: define(POLICY_KINDS.DEFAULT),
  ALWAYS: define(POLICY_KINDS.ALWAYS),
  /**
   * Same rule set as the resolver's default when used on its own; a stricter
   * conflict manager is a separate concern of the caller.
   */
  STRICT: define(POLICY_KINDS.STRICT),
  /** @deprecated Use EARLY_SEMVER or SEMVER_SPEC. */
  SEMVER: define(POLICY_KINDS.SEMVER),
  EARLY_SEMVER: define(POLICY_KINDS.EARLY_SEMVER),
  /** Unlike EARLY_SEMVER, 0.x versions are not compatible with each other. */
  SEMVER_SPEC: define(POLICY_KINDS.SEMVER_SPEC),
  PACK_VER: define(POLICY_KINDS.PACK_VER),
});
