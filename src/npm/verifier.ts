import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { HttpClient } from "../http/http-client.js";
import { DEFAULT_NPM_REGISTRY } from "../config/settings.js";
import {
  ProvenanceError,
  TransportError,
  UnsupportedEcosystemError,
  VersionNotFoundError,
  errorMessage,
  toError,
} from "../provenance/errors.js";
import {
  Ecosystem,
  ProvenanceStatus,
  createResult,
  type PackageIdentifier,
  type ProvenanceResult,
  type ProvenanceVerifier,
  type Result,
  type TrustedPublisher,
  type VerifyOptions,
} from "../provenance/types.js";
import type { BundleVerifier } from "../sigstore/bundle-verifier.js";
import { githubActionsPolicy } from "../sigstore/policy.js";
import {
  extractPublisherInfo,
  mergePublisher,
  publisherFromStatement,
} from "../sigstore/publisher.js";
import {
  attestationsUrl,
  encodePackageName,
  parsePackageMetadata,
  repositoryUrl,
  selectAttestation,
  type NpmAttestation,
  type NpmPackageMetadata,
  type NpmVersionMetadata,
} from "./metadata.js";

export interface NpmVerifierOptions {
  readonly bundleVerifier: BundleVerifier;
  readonly http?: HttpClient;
  readonly registryUrl?: string;
  readonly logger?: Logger;
}

type AttestationOutcome =
  | { verified: true; publisher: TrustedPublisher }
  | { verified: false; error: Error };

/**
 * npm provenance: modern Sigstore attestations are verified against the
 * SHA-512 of the published tarball, legacy registry signatures are only
 * reported.
 */
export class NpmVerifier implements ProvenanceVerifier {
  private readonly bundleVerifier: BundleVerifier;
  private readonly http: HttpClient;
  private readonly registryUrl: string;
  private readonly logger: Logger;

  constructor(options: NpmVerifierOptions) {
    this.bundleVerifier = options.bundleVerifier;
    this.http = options.http ?? new HttpClient();
    this.registryUrl = (options.registryUrl ?? DEFAULT_NPM_REGISTRY).replace(
      /\/+$/,
      "",
    );
    this.logger = options.logger ?? silentLogger();
  }

  supportsEcosystem(ecosystem: Ecosystem): boolean {
    return ecosystem === Ecosystem.Npm;
  }

  async verify(
    pkg: PackageIdentifier,
    options: VerifyOptions = {},
  ): Promise<ProvenanceResult> {
    if (!this.supportsEcosystem(pkg.ecosystem)) {
      throw new UnsupportedEcosystemError("npm", pkg.ecosystem);
    }
    const log = this.logger.child({
      ecosystem: pkg.ecosystem,
      name: pkg.name,
      version: pkg.version,
    });

    const metadata = await this.fetchPackageMetadata(pkg.name, options);
    const versionData = metadata.versions.get(pkg.version);
    if (!versionData) {
      throw new VersionNotFoundError(pkg.name, pkg.version);
    }
    log.debug("registry metadata fetched");

    const repositoryUri =
      repositoryUrl(metadata.repository) ?? repositoryUrl(versionData.repository);
    const dist = versionData.dist;

    if (dist.attestations !== undefined) {
      const outcome = await this.verifyAttestations(versionData, options, log);
      if (outcome.verified) {
        return createResult(pkg, {
          status: ProvenanceStatus.Verified,
          hasAttestations: true,
          attestationCount: 1,
          trustedPublisher: outcome.publisher,
          repositoryUri,
        });
      }
      log.debug({ error: outcome.error.message }, "attestation not verified");
      return createResult(pkg, {
        status: ProvenanceStatus.Attestations,
        hasAttestations: true,
        attestationCount: 1,
        repositoryUri,
        errorMessage: `attestation verification failed: ${outcome.error.message}`,
        details: { verification_error: outcome.error.message },
      });
    }

    if (dist.signatures !== undefined) {
      return createResult(pkg, {
        status: ProvenanceStatus.Signatures,
        hasSignatures: true,
        repositoryUri,
        details: { signatures: dist.signatures },
      });
    }

    return createResult(pkg, { status: ProvenanceStatus.None, repositoryUri });
  }

  private async fetchPackageMetadata(
    name: string,
    options: VerifyOptions,
  ): Promise<NpmPackageMetadata> {
    const url = `${this.registryUrl}/${encodePackageName(name)}`;
    const document = await this.http.getJson(url, {
      accept: "application/json",
      signal: options.signal,
    });
    try {
      return parsePackageMetadata(document);
    } catch (error) {
      throw new TransportError(
        url,
        `failed to decode package metadata: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * Transport failures and cancellation propagate; anything wrong with the
   * attestation itself downgrades to an unverified outcome.
   */
  private async verifyAttestations(
    versionData: NpmVersionMetadata,
    options: VerifyOptions,
    log: Logger,
  ): Promise<AttestationOutcome> {
    const attestations = versionData.dist.attestations;
    const url = attestationsUrl(attestations);
    const document = url
      ? await this.http.getJson(url, { signal: options.signal })
      : attestations;

    const selection = trySelectAttestation(document);
    if (!selection.ok) {
      return { verified: false, error: selection.error };
    }
    const selected = selection.value;

    const tarball = versionData.dist.tarball;
    if (!tarball) {
      return {
        verified: false,
        error: new Error("version metadata has no tarball URL"),
      };
    }
    const digest = await this.http.digest(tarball, "sha512", {
      signal: options.signal,
    });
    log.debug({ tarball }, "tarball digest computed");

    try {
      const verification = await this.bundleVerifier.verify({
        bundle: selected.bundle,
        digest: { algorithm: "sha512", value: digest },
        policy: githubActionsPolicy(),
      });
      const publisher = mergePublisher(
        publisherFromStatement(verification.statement),
        extractPublisherInfo(verification),
      );
      if (!publisher) {
        return {
          verified: false,
          error: new Error("verification produced no publisher"),
        };
      }
      return { verified: true, publisher };
    } catch (error) {
      if (error instanceof ProvenanceError && !isBundleFailure(error)) {
        throw error;
      }
      return { verified: false, error: toError(error, "verification failed") };
    }
  }
}

function isBundleFailure(error: ProvenanceError): boolean {
  return error.code === "BUNDLE_VERIFICATION_ERROR";
}

function trySelectAttestation(document: unknown): Result<NpmAttestation> {
  try {
    return { ok: true, value: selectAttestation(document) };
  } catch (error) {
    return { ok: false, error: toError(error, "malformed attestations") };
  }
}
