import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import {
  BatchVerificationError,
  RegistryError,
  errorMessage,
  toError,
} from "../provenance/errors.js";
import {
  ProvenanceStatus,
  createResult,
  formatPackage,
  type Ecosystem,
  type PackageIdentifier,
  type ProvenanceResult,
  type ProvenanceVerifier,
  type VerifyOptions,
} from "../provenance/types.js";
import { DEFAULT_CONCURRENCY } from "../config/settings.js";
import { mapConcurrent } from "./concurrency.js";

export interface VerificationOutcome {
  readonly result: ProvenanceResult;
  /** Set when the verifier failed; the result then has status ERROR. */
  readonly error?: Error;
}

export interface BatchOutcome {
  /** results[i] always belongs to packages[i]. */
  readonly results: readonly ProvenanceResult[];
  /** First failure by input index, if any package failed. */
  readonly error?: BatchVerificationError;
}

export interface ProvenanceServiceOptions {
  /** Maximum verifications in flight during a batch; 0 = unbounded. */
  readonly concurrency?: number;
  readonly logger?: Logger;
}

/**
 * Routes verification requests to the verifier registered for the package's
 * ecosystem. One verifier per ecosystem: a second registration is rejected
 * until the first is unregistered.
 */
export class ProvenanceService {
  private readonly verifiers = new Map<Ecosystem, ProvenanceVerifier>();
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(options: ProvenanceServiceOptions = {}) {
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.logger = options.logger ?? silentLogger();
  }

  registerVerifier(
    ecosystem: Ecosystem,
    verifier: ProvenanceVerifier | null | undefined,
  ): void {
    if (!verifier) {
      throw new RegistryError("verifier cannot be null");
    }
    if (!verifier.supportsEcosystem(ecosystem)) {
      throw new RegistryError(
        `verifier does not support ecosystem ${ecosystem}`,
      );
    }
    if (this.verifiers.has(ecosystem)) {
      throw new RegistryError(
        `a verifier is already registered for ecosystem ${ecosystem}`,
      );
    }
    this.verifiers.set(ecosystem, verifier);
    this.logger.debug({ ecosystem }, "verifier registered");
  }

  unregisterVerifier(ecosystem: Ecosystem): boolean {
    return this.verifiers.delete(ecosystem);
  }

  hasVerifier(ecosystem: Ecosystem): boolean {
    return this.verifiers.has(ecosystem);
  }

  registeredEcosystems(): Ecosystem[] {
    return [...this.verifiers.keys()];
  }

  async verifyProvenance(
    pkg: PackageIdentifier,
    options: VerifyOptions = {},
  ): Promise<VerificationOutcome> {
    const verifier = this.verifiers.get(pkg.ecosystem);
    if (!verifier) {
      return {
        result: createResult(pkg, {
          status: ProvenanceStatus.Unknown,
          errorMessage: `no verifier registered for ecosystem ${pkg.ecosystem}`,
        }),
      };
    }

    try {
      const result = await verifier.verify(pkg, options);
      this.logger.debug(
        { package: formatPackage(pkg), status: result.status },
        "provenance verified",
      );
      return { result };
    } catch (error) {
      const cause = toError(error, "verification failed");
      this.logger.warn(
        { package: formatPackage(pkg), error: errorMessage(cause) },
        "provenance verification failed",
      );
      return {
        result: createResult(pkg, {
          status: ProvenanceStatus.Error,
          errorMessage: cause.message || "verification failed",
        }),
        error: cause,
      };
    }
  }

  async batchVerify(
    packages: readonly PackageIdentifier[],
    options: VerifyOptions = {},
  ): Promise<BatchOutcome> {
    const outcomes = await mapConcurrent(packages, this.concurrency, (pkg) =>
      this.verifyProvenance(pkg, options),
    );

    const failedIndex = outcomes.findIndex((outcome) => outcome.error);
    const failed = failedIndex >= 0 ? outcomes[failedIndex] : undefined;
    const error =
      failed?.error !== undefined
        ? new BatchVerificationError(failedIndex, packages[failedIndex], failed.error)
        : undefined;

    return {
      results: outcomes.map((outcome) => outcome.result),
      ...(error ? { error } : {}),
    };
  }
}
