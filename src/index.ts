// Policy kinds and configuration tokens
export {
  POLICY_KINDS,
  POLICY_TOKENS,
  POLICY_REGISTRY,
  AMBIGUOUS_TOKEN,
  isPolicyKind,
  isPolicyToken,
  isDeprecatedPolicy,
  getPolicyMeta,
} from './policies.js';
export type { PolicyKind, PolicyToken, PolicyMeta } from './policies.js';

// Policies (pure functions, zero deps)
export {
  COMPATIBILITY,
  isCompatible,
  minimumCompatibleVersion,
  policyName,
} from './compatibility.js';
export type { VersionCompatibility } from './compatibility.js';
export { compatibilityFromName } from './lookup.js';

// Versions, intervals, constraints
export {
  parseVersion,
  compareVersions,
  compareSegments,
  compareSegmentLists,
  compareToEmpty,
  isEmptySegment,
  isNumericSegment,
  segmentsEqual,
  segmentListsEqual,
  versionsEqual,
  renderNumericSegments,
} from './version.js';
export type { Version, Segment, NumericSegment, OtherSegment } from './version.js';
export { ZERO_INTERVAL, isZeroInterval, isValidInterval, intervalContains } from './interval.js';
export type { VersionInterval } from './interval.js';
export { parseVersionConstraint } from './constraint.js';
export type { VersionConstraint } from './constraint.js';

// Errors
export { CompatibilityError, AmbiguousPolicyNameError } from './errors.js';
