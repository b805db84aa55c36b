import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { HttpClient } from "../http/http-client.js";
import { DEFAULT_PYPI_SIMPLE } from "../config/settings.js";
import {
  BundleVerificationError,
  ProvenanceError,
  TransportError,
  UnsupportedEcosystemError,
  errorMessage,
} from "../provenance/errors.js";
import {
  Ecosystem,
  ProvenanceStatus,
  createResult,
  type PackageIdentifier,
  type ProvenanceResult,
  type ProvenanceVerifier,
  type TrustedPublisher,
  type VerifyOptions,
} from "../provenance/types.js";
import type { BundleVerifier } from "../sigstore/bundle-verifier.js";
import {
  githubActionsPolicy,
  gitlabPolicy,
  type CertificateIdentityPolicy,
} from "../sigstore/policy.js";
import {
  extractPublisherInfo,
  mergePublisher,
  type DeclaredPublisher,
} from "../sigstore/publisher.js";
import {
  SIMPLE_JSON_MEDIA_TYPE,
  attestationToBundle,
  matchesVersion,
  normalizeProjectName,
  parseProvenanceObject,
  parseSimpleProject,
  type SimpleFile,
  type SimpleProject,
} from "./metadata.js";

export interface PypiVerifierOptions {
  readonly bundleVerifier: BundleVerifier;
  readonly http?: HttpClient;
  readonly simpleUrl?: string;
  readonly logger?: Logger;
}

/**
 * PyPI provenance per PEP 740: every distribution file of the requested
 * version that declares a provenance object is verified independently; one
 * verified file is enough.
 */
export class PypiVerifier implements ProvenanceVerifier {
  private readonly bundleVerifier: BundleVerifier;
  private readonly http: HttpClient;
  private readonly simpleUrl: string;
  private readonly logger: Logger;

  constructor(options: PypiVerifierOptions) {
    this.bundleVerifier = options.bundleVerifier;
    this.http = options.http ?? new HttpClient();
    this.simpleUrl = (options.simpleUrl ?? DEFAULT_PYPI_SIMPLE).replace(
      /\/+$/,
      "",
    );
    this.logger = options.logger ?? silentLogger();
  }

  supportsEcosystem(ecosystem: Ecosystem): boolean {
    return ecosystem === Ecosystem.PyPI;
  }

  async verify(
    pkg: PackageIdentifier,
    options: VerifyOptions = {},
  ): Promise<ProvenanceResult> {
    if (!this.supportsEcosystem(pkg.ecosystem)) {
      throw new UnsupportedEcosystemError("pypi", pkg.ecosystem);
    }
    const log = this.logger.child({
      ecosystem: pkg.ecosystem,
      name: pkg.name,
      version: pkg.version,
    });

    const project = await this.fetchSimpleProject(pkg.name, options);
    log.debug({ files: project.files.length }, "simple metadata fetched");

    const details: Record<string, unknown> = {};
    const verifiedFiles: string[] = [];
    let candidates = 0;
    let firstPublisher: TrustedPublisher | undefined;

    for (const file of project.files) {
      if (!file.provenance || !matchesVersion(file.filename, pkg.version)) {
        continue;
      }
      candidates += 1;
      try {
        const publisher = await this.verifyFile(file, file.provenance, options);
        verifiedFiles.push(file.filename);
        firstPublisher ??= publisher;
        log.debug({ file: file.filename }, "file provenance verified");
      } catch (error) {
        if (error instanceof ProvenanceError && error.code === "CANCELLED") {
          throw error;
        }
        details[`verification_error_${file.filename}`] = errorMessage(error);
        log.debug(
          { file: file.filename, error: errorMessage(error) },
          "file provenance not verified",
        );
      }
    }

    if (verifiedFiles.length > 0 && firstPublisher) {
      return createResult(pkg, {
        status: ProvenanceStatus.Verified,
        hasAttestations: true,
        attestationCount: candidates,
        trustedPublisher: firstPublisher,
        details: { ...details, verified_files: verifiedFiles },
      });
    }
    if (candidates > 0) {
      return createResult(pkg, {
        status: ProvenanceStatus.Attestations,
        hasAttestations: true,
        attestationCount: candidates,
        errorMessage: "attestations found but verification failed",
        details,
      });
    }
    return createResult(pkg, { status: ProvenanceStatus.None, details });
  }

  private async fetchSimpleProject(
    name: string,
    options: VerifyOptions,
  ): Promise<SimpleProject> {
    const url = `${this.simpleUrl}/${encodeURIComponent(normalizeProjectName(name))}/`;
    const document = await this.http.getJson(url, {
      accept: SIMPLE_JSON_MEDIA_TYPE,
      signal: options.signal,
    });
    try {
      return parseSimpleProject(document);
    } catch (error) {
      throw new TransportError(
        url,
        `failed to decode package metadata: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private async verifyFile(
    file: SimpleFile,
    provenanceUrl: string,
    options: VerifyOptions,
  ): Promise<TrustedPublisher> {
    const provenance = parseProvenanceObject(
      await this.http.getJson(provenanceUrl, { signal: options.signal }),
    );
    const bundle = provenance.attestationBundles[0];
    if (!bundle) {
      throw new Error("no attestation bundles in provenance");
    }
    const attestation = bundle.attestations[0];
    if (attestation === undefined) {
      throw new Error("no attestations in bundle");
    }

    const digest = await this.artifactDigest(file, options);
    const verification = await this.bundleVerifier.verify({
      bundle: attestationToBundle(attestation),
      digest: { algorithm: "sha256", value: digest },
      policy: policyForPublisher(bundle.publisher),
    });

    const publisher = mergePublisher(
      bundle.publisher,
      extractPublisherInfo(verification),
    );
    if (!publisher) {
      throw new BundleVerificationError(
        "verification-failed",
        "verification produced no publisher",
      );
    }
    return publisher;
  }

  private async artifactDigest(
    file: SimpleFile,
    options: VerifyOptions,
  ): Promise<Buffer> {
    const published = file.hashes.sha256;
    if (published) {
      if (!/^[0-9a-fA-F]{64}$/.test(published)) {
        throw new Error(`invalid sha256 hash for ${file.filename}`);
      }
      return Buffer.from(published, "hex");
    }
    if (!file.url) {
      throw new Error(`no hash or download URL for ${file.filename}`);
    }
    return await this.http.digest(file.url, "sha256", {
      signal: options.signal,
    });
  }
}

/** Certificate identity implied by the publisher PyPI recorded. */
export function policyForPublisher(
  publisher: DeclaredPublisher,
): CertificateIdentityPolicy | undefined {
  if (!publisher.repository) {
    return undefined;
  }
  switch (publisher.kind) {
    case "GitHub":
      return githubActionsPolicy(publisher.repository);
    case "GitLab":
      return gitlabPolicy(publisher.repository);
    default:
      return undefined;
  }
}
