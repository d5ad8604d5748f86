// ─── POLICY KINDS (SINGLE SOURCE OF TRUTH) ───

export const POLICY_KINDS = {
  DEFAULT: 'default',
  ALWAYS: 'always',
  STRICT: 'strict',
  SEMVER: 'semver',
  EARLY_SEMVER: 'early-semver',
  SEMVER_SPEC: 'semver-spec',
  PACK_VER: 'pvp',
} as const;

export type PolicyKind = typeof POLICY_KINDS[keyof typeof POLICY_KINDS];

// ─── CONFIGURATION TOKENS ───
// Every kind but the deprecated alias can be named in configuration.

export const POLICY_TOKENS = {
  DEFAULT: POLICY_KINDS.DEFAULT,
  ALWAYS: POLICY_KINDS.ALWAYS,
  STRICT: POLICY_KINDS.STRICT,
  EARLY_SEMVER: POLICY_KINDS.EARLY_SEMVER,
  SEMVER_SPEC: POLICY_KINDS.SEMVER_SPEC,
  PACK_VER: POLICY_KINDS.PACK_VER,
} as const;

export type PolicyToken = typeof POLICY_TOKENS[keyof typeof POLICY_TOKENS];

/** Rejected outright: it could mean either semver flavour. */
export const AMBIGUOUS_TOKEN = 'semver';

// ─── PER-KIND METADATA ───

export interface PolicyMeta {
  kind: PolicyKind;
  lifecycle: 'active' | 'deprecated';
  description: string;
  replacedBy?: PolicyKind;
}

export const POLICY_REGISTRY: readonly PolicyMeta[] = [
  {
    kind: POLICY_KINDS.DEFAULT,
    lifecycle: 'active',
    description: 'Same as pvp',
  },
  {
    kind: POLICY_KINDS.ALWAYS,
    lifecycle: 'active',
    description: 'Any version satisfies any constraint',
  },
  {
    kind: POLICY_KINDS.STRICT,
    lifecycle: 'active',
    description: 'Only the exact preferred version, or a version inside the given range',
  },
  {
    kind: POLICY_KINDS.SEMVER,
    lifecycle: 'deprecated',
    description: 'Alias of early-semver',
    replacedBy: POLICY_KINDS.EARLY_SEMVER,
  },
  {
    kind: POLICY_KINDS.EARLY_SEMVER,
    lifecycle: 'active',
    description: 'Major frozen; 0.x versions freeze major.minor instead',
  },
  {
    kind: POLICY_KINDS.SEMVER_SPEC,
    lifecycle: 'active',
    description: 'Major frozen; 0.x versions are never compatible with one another',
  },
  {
    kind: POLICY_KINDS.PACK_VER,
    lifecycle: 'active',
    description: 'major.minor frozen, later segments free',
  },
] as const;

// ─── HELPERS ───

export function isPolicyKind(v: string): v is PolicyKind {
  return Object.values(POLICY_KINDS).includes(v as PolicyKind);
}

export function isPolicyToken(v: string): v is PolicyToken {
  return Object.values(POLICY_TOKENS).includes(v as PolicyToken);
}

export function isDeprecatedPolicy(kind: PolicyKind): boolean {
  return getPolicyMeta(kind)?.lifecycle === 'deprecated';
}

export function getPolicyMeta(kind: PolicyKind): PolicyMeta | undefined {
  return POLICY_REGISTRY.find(m => m.kind === kind);
}
