import { ProvenanceStatus } from "../provenance/types.js";
import type {
  PackageReport,
  ProvenanceReport,
  ReportEntry,
  ReportInput,
  StatusCounts,
} from "./types.js";

export function buildJsonReport(input: ReportInput): ProvenanceReport {
  return {
    tool: { name: "mcp-provenance", version: input.toolVersion },
    summary: { counts: countStatuses(input.entries) },
    packages: input.entries.map(toPackageReport),
  };
}

function toPackageReport(entry: ReportEntry): PackageReport {
  const result = entry.result;
  return {
    ...(entry.source ? { source: entry.source } : {}),
    ecosystem: result.packageId.ecosystem,
    name: result.packageId.name,
    version: result.packageId.version,
    status: result.status,
    has_attestations: result.hasAttestations,
    attestation_count: result.attestationCount,
    has_signatures: result.hasSignatures,
    ...(result.trustedPublisher
      ? { trusted_publisher: result.trustedPublisher }
      : {}),
    ...(result.repositoryUri ? { repository_uri: result.repositoryUri } : {}),
    ...(result.errorMessage ? { error_message: result.errorMessage } : {}),
    details: result.details,
    expectations: entry.expectations ?? [],
    ...(entry.requirements ? { requirements: entry.requirements } : {}),
  };
}

function countStatuses(entries: readonly ReportEntry[]): StatusCounts {
  const counts: StatusCounts = {
    verified: 0,
    attestations: 0,
    signatures: 0,
    trusted_publisher: 0,
    none: 0,
    unknown: 0,
    error: 0,
    total: entries.length,
  };

  for (const { result } of entries) {
    switch (result.status) {
      case ProvenanceStatus.Verified:
        counts.verified += 1;
        break;
      case ProvenanceStatus.Attestations:
        counts.attestations += 1;
        break;
      case ProvenanceStatus.Signatures:
        counts.signatures += 1;
        break;
      case ProvenanceStatus.TrustedPublisher:
        counts.trusted_publisher += 1;
        break;
      case ProvenanceStatus.None:
        counts.none += 1;
        break;
      case ProvenanceStatus.Unknown:
        counts.unknown += 1;
        break;
      case ProvenanceStatus.Error:
        counts.error += 1;
        break;
      default:
        break;
    }
  }

  return counts;
}
