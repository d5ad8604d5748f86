export class CompatibilityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CompatibilityError';
  }
}

/**
 * Thrown for the bare `semver` token. Never returned as a result and never
 * caught inside this library: the caller has to pick a variant explicitly.
 */
export class AmbiguousPolicyNameError extends CompatibilityError {
  constructor(public readonly token: string) {
    super(
      [
        `'${token}' is ambiguous.`,
        'Based on Semantic Versioning 2.0.0, 0.y.z updates are all initial development, so 0.6.0 and',
        '0.6.1 would NOT maintain any compatibility, but many ecosystems start keeping binary',
        'compatibility within 0.y.z releases.',
        '',
        "Specify 'early-semver' for the early variant.",
        "Specify 'semver-spec' for the spec-correct SemVer.",
      ].join('\n'),
    );
    this.name = 'AmbiguousPolicyNameError';
  }
}
