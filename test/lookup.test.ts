import { describe, it, expect } from 'vitest';
import { compatibilityFromName } from '../src/lookup.js';
import { COMPATIBILITY } from '../src/compatibility.js';
import { AmbiguousPolicyNameError, CompatibilityError } from '../src/errors.js';
import { POLICY_TOKENS } from '../src/policies.js';

describe('compatibilityFromName', () => {
  it('maps every configuration token to its policy', () => {
    expect(compatibilityFromName('default')).toBe(COMPATIBILITY.DEFAULT);
    expect(compatibilityFromName('always')).toBe(COMPATIBILITY.ALWAYS);
    expect(compatibilityFromName('strict')).toBe(COMPATIBILITY.STRICT);
    expect(compatibilityFromName('early-semver')).toBe(COMPATIBILITY.EARLY_SEMVER);
    expect(compatibilityFromName('semver-spec')).toBe(COMPATIBILITY.SEMVER_SPEC);
    expect(compatibilityFromName('pvp')).toBe(COMPATIBILITY.PACK_VER);
  });

  it('resolves each token to a policy of the same kind', () => {
    for (const token of Object.values(POLICY_TOKENS)) {
      expect(compatibilityFromName(token)?.kind).toBe(token);
    }
  });

  it('returns undefined for unknown tokens', () => {
    expect(compatibilityFromName('bogus')).toBeUndefined();
    expect(compatibilityFromName('PVP')).toBeUndefined();
    expect(compatibilityFromName('')).toBeUndefined();
  });

  it('does not round-trip diagnostic names', () => {
    expect(compatibilityFromName(COMPATIBILITY.PACK_VER.name)).toBeUndefined();
  });

  it('refuses the ambiguous semver token', () => {
    expect(() => compatibilityFromName('semver')).toThrow(AmbiguousPolicyNameError);
  });

  it('explains how to pick a semver flavour', () => {
    try {
      compatibilityFromName('semver');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(CompatibilityError);
      if (e instanceof AmbiguousPolicyNameError) {
        expect(e.token).toBe('semver');
        expect(e.name).toBe('AmbiguousPolicyNameError');
        expect(e.message).toContain("Specify 'early-semver' for the early variant.");
        expect(e.message).toContain("Specify 'semver-spec' for the spec-correct SemVer.");
      }
    }
  });
});
