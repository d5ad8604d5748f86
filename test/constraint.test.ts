import { describe, it, expect } from 'vitest';
import { parseVersionConstraint } from '../src/constraint.js';
import { ZERO_INTERVAL, intervalContains, isZeroInterval } from '../src/interval.js';
import { parseVersion } from '../src/version.js';

const contains = (constraint: string, version: string) =>
  intervalContains(parseVersionConstraint(constraint).interval, parseVersion(version));

describe('parseVersionConstraint', () => {
  it('reads a plain version as a preferred version', () => {
    const c = parseVersionConstraint('1.2');
    expect(c.preferred.map(v => v.repr)).toEqual(['1.2']);
    expect(c.interval).toBe(ZERO_INTERVAL);
  });

  it('matches nothing for blank input', () => {
    const c = parseVersionConstraint('   ');
    expect(c.preferred).toEqual([]);
    expect(isZeroInterval(c.interval)).toBe(true);
  });

  it('reads a half-open interval', () => {
    const c = parseVersionConstraint('[1.0,2.0)');
    expect(c.preferred).toEqual([]);
    expect(c.interval.from?.repr).toBe('1.0');
    expect(c.interval.to?.repr).toBe('2.0');
    expect(c.interval.fromIncluded).toBe(true);
    expect(c.interval.toIncluded).toBe(false);
  });

  it('reads a pinned version', () => {
    expect(contains('[1.0]', '1.0')).toBe(true);
    expect(contains('[1.0]', '1.0.1')).toBe(false);
  });

  it('rejects malformed and inverted intervals', () => {
    for (const input of ['(1.0)', '[2.0,1.0]', '[1.0,2.0,3.0]', '[1.0,']) {
      const c = parseVersionConstraint(input);
      expect(c.preferred).toEqual([]);
      expect(isZeroInterval(c.interval)).toBe(true);
    }
  });

  it('keeps an explicit unbounded interval distinct from zero', () => {
    const c = parseVersionConstraint('(,)');
    expect(isZeroInterval(c.interval)).toBe(false);
    expect(intervalContains(c.interval, parseVersion('42'))).toBe(true);
  });

  it('reads open-ended bounds', () => {
    expect(contains('(,2.0]', '2.0')).toBe(true);
    expect(contains('(,2.0]', '2.0.1')).toBe(false);
    expect(contains('(1.0,)', '1.0')).toBe(false);
    expect(contains('(1.0,)', '1.0.1')).toBe(true);
  });

  it('reads a prefix as a range up to the next version', () => {
    const c = parseVersionConstraint('1.2+');
    expect(c.interval.to?.repr).toBe('1.3');
    expect(contains('1.2+', '1.2.9')).toBe(true);
    expect(contains('1.2.+', '1.2.9')).toBe(true);
    expect(contains('1.2+', '1.3')).toBe(false);
    expect(contains('1.2+', '1.1.9')).toBe(false);
  });

  it('reads a lone + as any version', () => {
    const c = parseVersionConstraint('+');
    expect(isZeroInterval(c.interval)).toBe(false);
    expect(contains('+', '0.0.1')).toBe(true);
  });

  it('falls back to a preferred version for a non-numeric prefix', () => {
    const c = parseVersionConstraint('1.0-rc+');
    expect(c.preferred.map(v => v.repr)).toEqual(['1.0-rc+']);
    expect(c.interval).toBe(ZERO_INTERVAL);
  });
});
