import type { VersionCompatibility } from './compatibility.js';
import { COMPATIBILITY } from './compatibility.js';
import { AMBIGUOUS_TOKEN, POLICY_TOKENS } from './policies.js';
import { AmbiguousPolicyNameError } from './errors.js';

/**
 * Map a configuration token to its policy.
 * Returns undefined for unknown tokens. Throws AmbiguousPolicyNameError for
 * `semver`, which must never be resolved to either flavour silently.
 */
export function compatibilityFromName(input: string): VersionCompatibility | undefined {
  switch (input) {
    case POLICY_TOKENS.DEFAULT:
      return COMPATIBILITY.DEFAULT;
    case POLICY_TOKENS.ALWAYS:
      return COMPATIBILITY.ALWAYS;
    case POLICY_TOKENS.STRICT:
      return COMPATIBILITY.STRICT;
    case POLICY_TOKENS.EARLY_SEMVER:
      return COMPATIBILITY.EARLY_SEMVER;
    case POLICY_TOKENS.SEMVER_SPEC:
      return COMPATIBILITY.SEMVER_SPEC;
    case POLICY_TOKENS.PACK_VER:
      return COMPATIBILITY.PACK_VER;
    case AMBIGUOUS_TOKEN:
      throw new AmbiguousPolicyNameError(input);
    default:
      return undefined;
  }
}
