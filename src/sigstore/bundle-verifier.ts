import { bundleFromJSON } from "@sigstore/bundle";
import type { TrustedRoot } from "@sigstore/protobuf-specs";
import { getTrustedRoot } from "@sigstore/tuf";
import { Verifier, toSignedEntity, toTrustMaterial } from "@sigstore/verify";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import {
  BundleVerificationError,
  TrustRootError,
  errorMessage,
  type BundleFailureReason,
} from "../provenance/errors.js";
import type { DigestAlgorithm } from "../http/http-client.js";
import {
  matchIdentity,
  type CertificateIdentity,
  type CertificateIdentityPolicy,
} from "./policy.js";
import {
  checkSubjectDigest,
  isRecord,
  type InTotoStatement,
} from "./subject.js";

export interface ArtifactDigest {
  readonly algorithm: DigestAlgorithm;
  readonly value: Uint8Array;
}

export interface BundleVerificationRequest {
  /** Raw bundle bytes, JSON text or an already decoded JSON object. */
  readonly bundle: Uint8Array | string | Record<string, unknown>;
  readonly digest: ArtifactDigest;
  readonly policy?: CertificateIdentityPolicy;
  /** Needed only for message-signature bundles. */
  readonly artifact?: Buffer;
}

export interface BundleVerification {
  readonly identity: CertificateIdentity;
  readonly statement?: InTotoStatement;
}

export interface BundleVerifier {
  /** Resolves only when every check passed; otherwise throws BundleVerificationError. */
  verify(request: BundleVerificationRequest): Promise<BundleVerification>;
}

export interface TrustRootOptions {
  readonly mirrorUrl?: string;
  readonly cachePath?: string;
  readonly timeoutMs?: number;
}

/** The signature, certificate and log checks run on a parsed bundle. */
export type VerificationEngine = Pick<Verifier, "verify">;

export interface SigstoreBundleVerifierOptions extends TrustRootOptions {
  readonly loadTrustedRoot?: (options: TrustRootOptions) => Promise<TrustedRoot>;
  readonly createEngine?: (trustedRoot: TrustedRoot) => VerificationEngine;
  readonly tlogThreshold?: number;
  readonly ctlogThreshold?: number;
  readonly logger?: Logger;
}

type SigstoreSigner = ReturnType<VerificationEngine["verify"]>;

/**
 * Verifies Sigstore bundles against the public-good trust root. The trust
 * root is fetched once through TUF when the verifier is created and is
 * read-only afterwards, so one instance can serve concurrent verifications.
 */
export class SigstoreBundleVerifier implements BundleVerifier {
  private readonly verifier: VerificationEngine;
  private readonly logger: Logger;

  private constructor(verifier: VerificationEngine, logger: Logger) {
    this.verifier = verifier;
    this.logger = logger;
  }

  static async create(
    options: SigstoreBundleVerifierOptions = {},
  ): Promise<SigstoreBundleVerifier> {
    const logger = options.logger ?? silentLogger();
    const load = options.loadTrustedRoot ?? loadTrustedRootFromTuf;
    let trustedRoot: TrustedRoot;
    try {
      trustedRoot = await load({
        mirrorUrl: options.mirrorUrl,
        cachePath: options.cachePath,
        timeoutMs: options.timeoutMs,
      });
    } catch (error) {
      throw new TrustRootError(
        `failed to load Sigstore trusted root: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    let verifier: VerificationEngine;
    try {
      verifier = options.createEngine
        ? options.createEngine(trustedRoot)
        : new Verifier(toTrustMaterial(trustedRoot), {
            tlogThreshold: options.tlogThreshold ?? 1,
            ctlogThreshold: options.ctlogThreshold ?? 1,
          });
    } catch (error) {
      throw new TrustRootError(
        `failed to build trust material: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    logger.debug(
      {
        tlogs: trustedRoot.tlogs.length,
        certificateAuthorities: trustedRoot.certificateAuthorities.length,
      },
      "sigstore trusted root loaded",
    );
    return new SigstoreBundleVerifier(verifier, logger);
  }

  async verify(request: BundleVerificationRequest): Promise<BundleVerification> {
    const bundle = parseBundle(request.bundle);

    const subject = checkSubjectDigest(
      bundle.content,
      request.digest.algorithm,
      request.digest.value,
    );
    if (!subject.ok) {
      throw new BundleVerificationError(
        "digest-mismatch",
        subject.error.message,
      );
    }

    let signer: SigstoreSigner;
    try {
      const entity = toSignedEntity(bundle, request.artifact);
      signer = this.verifier.verify(entity);
    } catch (error) {
      throw new BundleVerificationError(
        classifyEngineError(error),
        errorMessage(error),
        { cause: error },
      );
    }

    const identity: CertificateIdentity = {
      issuer: signer.identity?.extensions?.issuer,
      subjectAlternativeName: signer.identity?.subjectAlternativeName,
    };
    const violations = request.policy
      ? matchIdentity(request.policy, identity)
      : [];
    if (violations.length > 0) {
      throw new BundleVerificationError("policy-mismatch", violations.join("; "));
    }

    this.logger.debug(
      { issuer: identity.issuer, san: identity.subjectAlternativeName },
      "sigstore bundle verified",
    );
    return { identity, statement: subject.value.statement };
  }
}

export async function loadTrustedRootFromTuf(
  options: TrustRootOptions,
): Promise<TrustedRoot> {
  return await getTrustedRoot({
    mirrorURL: options.mirrorUrl,
    cachePath: options.cachePath,
    timeout: options.timeoutMs,
  });
}

function parseBundle(
  input: BundleVerificationRequest["bundle"],
): ReturnType<typeof bundleFromJSON> {
  let json: unknown = input;
  if (typeof input === "string" || input instanceof Uint8Array) {
    const text =
      typeof input === "string" ? input : Buffer.from(input).toString("utf8");
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new BundleVerificationError(
        "malformed-bundle",
        "bundle is not valid JSON",
        { cause: error },
      );
    }
  }
  if (!isRecord(json)) {
    throw new BundleVerificationError(
      "malformed-bundle",
      "bundle must be a JSON object",
    );
  }
  try {
    return bundleFromJSON(json);
  } catch (error) {
    throw new BundleVerificationError(
      "malformed-bundle",
      errorMessage(error),
      { cause: error },
    );
  }
}

/** Map a verification engine error code onto the failure taxonomy. */
export function classifyEngineError(error: unknown): BundleFailureReason {
  const code =
    isRecord(error) && typeof error.code === "string" ? error.code : "";
  const message = errorMessage(error).toLowerCase();
  if (code.startsWith("TLOG") || message.includes("transparency log")) {
    return "missing-tlog-proof";
  }
  if (message.includes("sct") || message.includes("ctlog")) {
    return "missing-sct";
  }
  if (code === "CERTIFICATE_ERROR" || code === "UNTRUSTED_SIGNER_ERROR") {
    return "untrusted-chain";
  }
  if (code === "SIGNATURE_ERROR" || code === "PUBLIC_KEY_ERROR") {
    return "signature-invalid";
  }
  return "verification-failed";
}
