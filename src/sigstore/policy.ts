export const GITHUB_ACTIONS_ISSUER = "https://token.actions.githubusercontent.com";
export const GITLAB_ISSUER = "https://gitlab.com";

/**
 * Constraints on the signing certificate. Every field that is set must match;
 * an empty policy accepts any identity the trust root accepts.
 */
export interface CertificateIdentityPolicy {
  /** Exact OIDC issuer recorded in the certificate extension. */
  readonly issuer?: string;
  /** Regular expression the certificate SAN must match. */
  readonly subjectPattern?: string;
}

export interface CertificateIdentity {
  readonly issuer?: string;
  readonly subjectAlternativeName?: string;
}

/**
 * Workflows running in GitHub Actions. Without a repository any GitHub
 * hosted workflow is accepted.
 */
export function githubActionsPolicy(
  repository?: string,
): CertificateIdentityPolicy {
  return {
    issuer: GITHUB_ACTIONS_ISSUER,
    subjectPattern: repository
      ? `^https://github\\.com/${escapeRegExp(repository)}/`
      : "^https://github\\.com/",
  };
}

export function gitlabPolicy(repository: string): CertificateIdentityPolicy {
  return {
    issuer: GITLAB_ISSUER,
    subjectPattern: `^https://gitlab\\.com/${escapeRegExp(repository)}//`,
  };
}

/** Returns the list of violated constraints, empty when the identity matches. */
export function matchIdentity(
  policy: CertificateIdentityPolicy,
  identity: CertificateIdentity,
): string[] {
  const violations: string[] = [];
  if (policy.issuer !== undefined && identity.issuer !== policy.issuer) {
    violations.push(
      `certificate issuer ${formatValue(identity.issuer)} does not equal ${policy.issuer}`,
    );
  }
  if (policy.subjectPattern !== undefined) {
    const pattern = new RegExp(policy.subjectPattern);
    const san = identity.subjectAlternativeName;
    if (san === undefined || !pattern.test(san)) {
      violations.push(
        `certificate identity ${formatValue(san)} does not match ${policy.subjectPattern}`,
      );
    }
  }
  return violations;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

function formatValue(value: string | undefined): string {
  return value === undefined ? "<missing>" : `'${value}'`;
}
