export {
  ECOSYSTEMS,
  Ecosystem,
  ProvenanceStatus,
  createResult,
  formatPackage,
  isEcosystem,
} from "./provenance/types.js";
export type {
  PackageIdentifier,
  ProvenanceResult,
  ProvenanceVerifier,
  Result,
  TrustedPublisher,
  VerifyOptions,
} from "./provenance/types.js";
export {
  BatchVerificationError,
  BundleVerificationError,
  CancelledError,
  ConfigError,
  ProvenanceError,
  RegistryError,
  TransportError,
  TrustRootError,
  UnsupportedEcosystemError,
  VersionNotFoundError,
} from "./provenance/errors.js";
export type {
  BundleFailureReason,
  ProvenanceErrorCode,
} from "./provenance/errors.js";
export { createLogger, silentLogger } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";
export { resolveSettings } from "./config/settings.js";
export type { Settings, SettingsOverrides } from "./config/settings.js";
export { HttpClient } from "./http/http-client.js";
export type { FetchLike } from "./http/http-client.js";
export { SigstoreBundleVerifier } from "./sigstore/bundle-verifier.js";
export type {
  BundleVerification,
  BundleVerificationRequest,
  BundleVerifier,
} from "./sigstore/bundle-verifier.js";
export { githubActionsPolicy, gitlabPolicy } from "./sigstore/policy.js";
export type { CertificateIdentityPolicy } from "./sigstore/policy.js";
export { extractPublisherInfo } from "./sigstore/publisher.js";
export { NpmVerifier } from "./npm/verifier.js";
export { PypiVerifier } from "./pypi/verifier.js";
export { ProvenanceService } from "./service/provenance-service.js";
export type {
  BatchOutcome,
  VerificationOutcome,
} from "./service/provenance-service.js";
export { createProvenanceService } from "./service/factory.js";
export {
  defaultRequirements,
  validateRequirements,
} from "./requirements/requirements.js";
export type { ProvenanceRequirements } from "./requirements/requirements.js";
export { loadServerSpec, toPackageIdentifier } from "./spec/spec-loader.js";
export { compareWithSpec } from "./spec/spec-compare.js";
export type { ExpectationCheck } from "./spec/spec-compare.js";
export type { ServerSpec } from "./spec/types.js";
export {
  buildJsonReport,
  renderMarkdownReport,
  type MarkdownRenderOptions,
  type PackageReport,
  type ProvenanceReport,
  type ReportEntry,
  type ReportInput,
  type RequirementsOutcome,
  type StatusCounts,
  type ToolInfo,
} from "./report/index.js";
