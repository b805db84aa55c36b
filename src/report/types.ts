import type { ExpectationCheck } from "../spec/spec-compare.js";
import type { ProvenanceResult, TrustedPublisher } from "../provenance/types.js";

export interface ToolInfo {
  readonly name: "mcp-provenance";
  readonly version: string;
}

export interface StatusCounts {
  verified: number;
  attestations: number;
  signatures: number;
  trusted_publisher: number;
  none: number;
  unknown: number;
  error: number;
  total: number;
}

export interface RequirementsOutcome {
  readonly ok: boolean;
  readonly message?: string;
}

export interface PackageReport {
  readonly source?: string;
  readonly ecosystem: string;
  readonly name: string;
  readonly version: string;
  readonly status: string;
  readonly has_attestations: boolean;
  readonly attestation_count: number;
  readonly has_signatures: boolean;
  readonly trusted_publisher?: TrustedPublisher;
  readonly repository_uri?: string;
  readonly error_message?: string;
  readonly details: Readonly<Record<string, unknown>>;
  readonly expectations: readonly ExpectationCheck[];
  readonly requirements?: RequirementsOutcome;
}

export interface ProvenanceReport {
  readonly tool: ToolInfo;
  readonly summary: { readonly counts: StatusCounts };
  readonly packages: readonly PackageReport[];
}

export interface ReportEntry {
  /** Spec file the package came from, when there was one. */
  readonly source?: string;
  readonly result: ProvenanceResult;
  readonly expectations?: readonly ExpectationCheck[];
  readonly requirements?: RequirementsOutcome;
}

export interface ReportInput {
  readonly toolVersion: string;
  readonly entries: readonly ReportEntry[];
}
