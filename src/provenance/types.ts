export const enum Ecosystem {
  Npm = "npm",
  PyPI = "pypi",
  // Reserved: no verifier ships for Go modules yet.
  Go = "go",
}

export const enum ProvenanceStatus {
  Verified = "VERIFIED",
  Attestations = "ATTESTATIONS",
  Signatures = "SIGNATURES",
  TrustedPublisher = "TRUSTED_PUBLISHER",
  None = "NONE",
  Unknown = "UNKNOWN",
  Error = "ERROR",
}

export const ECOSYSTEMS: readonly Ecosystem[] = [
  Ecosystem.Npm,
  Ecosystem.PyPI,
  Ecosystem.Go,
];

export interface PackageIdentifier {
  readonly ecosystem: Ecosystem;
  readonly name: string;
  /** Exact published version, never a range. */
  readonly version: string;
}

export interface TrustedPublisher {
  /** Issuer class, e.g. "GitHub", "GitLab" or the generic "Verified". */
  readonly kind: string;
  /** owner/repo */
  readonly repository: string;
  readonly workflow?: string;
  readonly claims: Readonly<Record<string, unknown>>;
}

export interface ProvenanceResult {
  readonly packageId: PackageIdentifier;
  readonly status: ProvenanceStatus;
  readonly hasAttestations: boolean;
  readonly attestationCount: number;
  readonly hasSignatures: boolean;
  readonly trustedPublisher?: TrustedPublisher;
  readonly repositoryUri?: string;
  readonly errorMessage?: string;
  /** Diagnostics only; status never depends on these. */
  readonly details: Readonly<Record<string, unknown>>;
}

export interface VerifyOptions {
  readonly signal?: AbortSignal;
}

export interface ProvenanceVerifier {
  /**
   * Verify the provenance of one package version. Transport failures,
   * cancellation and a missing version are thrown as ProvenanceError
   * subclasses; every other outcome is reported through the result status.
   */
  verify(
    pkg: PackageIdentifier,
    options?: VerifyOptions,
  ): Promise<ProvenanceResult>;

  supportsEcosystem(ecosystem: Ecosystem): boolean;
}

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function formatPackage(pkg: PackageIdentifier): string {
  return `${pkg.ecosystem}:${pkg.name}@${pkg.version}`;
}

export function isEcosystem(value: string): value is Ecosystem {
  return ECOSYSTEMS.some((ecosystem) => ecosystem === value);
}

export function createResult(
  packageId: PackageIdentifier,
  fields: Omit<Partial<ProvenanceResult>, "packageId"> & {
    status: ProvenanceStatus;
  },
): ProvenanceResult {
  return {
    hasAttestations: false,
    attestationCount: 0,
    hasSignatures: false,
    details: {},
    ...fields,
    packageId,
  };
}
