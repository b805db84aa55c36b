import {
  ProvenanceStatus,
  type ProvenanceResult,
  type Result,
} from "../provenance/types.js";

export interface ProvenanceRequirements {
  readonly requireAttestations: boolean;
  readonly requireTrustedPublisher: boolean;
  readonly requireSignatures: boolean;
  /** When false a package without any provenance fails. */
  readonly allowNone: boolean;
}

export function defaultRequirements(): ProvenanceRequirements {
  return {
    requireAttestations: false,
    requireTrustedPublisher: false,
    requireSignatures: false,
    allowNone: true,
  };
}

/** Statuses that never satisfy a requirement: the check itself did not run. */
const INCONCLUSIVE = new Set<ProvenanceStatus>([
  ProvenanceStatus.Error,
  ProvenanceStatus.Unknown,
]);

export function validateRequirements(
  result: ProvenanceResult,
  requirements: ProvenanceRequirements,
): Result<void> {
  const unmet: string[] = [];
  const anyRequired =
    requirements.requireAttestations ||
    requirements.requireTrustedPublisher ||
    requirements.requireSignatures ||
    !requirements.allowNone;

  if (anyRequired && INCONCLUSIVE.has(result.status)) {
    unmet.push(
      `provenance could not be determined (${result.status}${result.errorMessage ? `: ${result.errorMessage}` : ""})`,
    );
  }
  if (requirements.requireAttestations && !result.hasAttestations) {
    unmet.push("attestations are required but none were found");
  }
  if (
    requirements.requireTrustedPublisher &&
    !result.trustedPublisher &&
    result.status !== ProvenanceStatus.TrustedPublisher
  ) {
    unmet.push("a trusted publisher is required but none was established");
  }
  if (requirements.requireSignatures && !result.hasSignatures && !result.hasAttestations) {
    unmet.push("signatures are required but none were found");
  }
  if (!requirements.allowNone && result.status === ProvenanceStatus.None) {
    unmet.push("package has no provenance information");
  }

  if (unmet.length > 0) {
    return {
      ok: false,
      error: new Error(`Provenance requirements not met: ${unmet.join("; ")}`),
    };
  }
  return { ok: true, value: undefined };
}

/** Gate for --strict: only cryptographically backed outcomes pass. */
export function isAcceptedInStrictMode(result: ProvenanceResult): boolean {
  return (
    result.status === ProvenanceStatus.Verified ||
    result.status === ProvenanceStatus.Attestations
  );
}
