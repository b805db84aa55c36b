import type { PackageIdentifier } from "./types.js";
import { formatPackage } from "./types.js";

export type ProvenanceErrorCode =
  | "TRANSPORT_ERROR"
  | "CANCELLED"
  | "VERSION_NOT_FOUND"
  | "UNSUPPORTED_ECOSYSTEM"
  | "REGISTRY_ERROR"
  | "TRUST_ROOT_ERROR"
  | "BUNDLE_VERIFICATION_ERROR"
  | "CONFIG_ERROR"
  | "BATCH_ERROR";

export class ProvenanceError extends Error {
  readonly code: ProvenanceErrorCode;

  constructor(
    code: ProvenanceErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class TransportError extends ProvenanceError {
  readonly url: string;
  readonly status?: number;

  constructor(
    url: string,
    message: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super("TRANSPORT_ERROR", message, { cause: options?.cause });
    this.url = url;
    this.status = options?.status;
  }
}

export class CancelledError extends ProvenanceError {
  constructor(message = "verification cancelled", options?: { cause?: unknown }) {
    super("CANCELLED", message, options);
  }
}

export class VersionNotFoundError extends ProvenanceError {
  readonly packageName: string;
  readonly version: string;

  constructor(packageName: string, version: string) {
    super(
      "VERSION_NOT_FOUND",
      `version ${version} not found for package ${packageName}`,
    );
    this.packageName = packageName;
    this.version = version;
  }
}

export class UnsupportedEcosystemError extends ProvenanceError {
  constructor(verifierName: string, ecosystem: string) {
    super(
      "UNSUPPORTED_ECOSYSTEM",
      `${verifierName} verifier does not support ecosystem ${ecosystem}`,
    );
  }
}

export class RegistryError extends ProvenanceError {
  constructor(message: string) {
    super("REGISTRY_ERROR", message);
  }
}

export class TrustRootError extends ProvenanceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TRUST_ROOT_ERROR", message, options);
  }
}

export type BundleFailureReason =
  | "malformed-bundle"
  | "digest-mismatch"
  | "untrusted-chain"
  | "missing-tlog-proof"
  | "missing-sct"
  | "signature-invalid"
  | "policy-mismatch"
  | "verification-failed";

export class BundleVerificationError extends ProvenanceError {
  readonly reason: BundleFailureReason;

  constructor(
    reason: BundleFailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("BUNDLE_VERIFICATION_ERROR", `${reason}: ${message}`, options);
    this.reason = reason;
  }
}

export class ConfigError extends ProvenanceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_ERROR", message, options);
  }
}

export class BatchVerificationError extends ProvenanceError {
  readonly index: number;
  readonly packageId: PackageIdentifier;

  constructor(index: number, packageId: PackageIdentifier, cause: Error) {
    super(
      "BATCH_ERROR",
      `verification of ${formatPackage(packageId)} (index ${index}) failed: ${cause.message}`,
      { cause },
    );
    this.index = index;
    this.packageId = packageId;
  }
}

export function toError(error: unknown, fallback: string): Error {
  return error instanceof Error ? error : new Error(fallback);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
