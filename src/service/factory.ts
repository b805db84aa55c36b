import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { HttpClient, type FetchLike } from "../http/http-client.js";
import type { Settings } from "../config/settings.js";
import { Ecosystem } from "../provenance/types.js";
import {
  SigstoreBundleVerifier,
  type BundleVerifier,
} from "../sigstore/bundle-verifier.js";
import { NpmVerifier } from "../npm/verifier.js";
import { PypiVerifier } from "../pypi/verifier.js";
import { ProvenanceService } from "./provenance-service.js";

export interface ServiceDependencies {
  readonly logger?: Logger;
  readonly fetch?: FetchLike;
  /** Replaces the Sigstore verifier (and its trust-root download). */
  readonly bundleVerifier?: BundleVerifier;
  readonly userAgent?: string;
}

/**
 * Build a service with the npm and PyPI verifiers registered. Both share one
 * HTTP client and one Sigstore verifier, so the trust root is fetched once.
 */
export async function createProvenanceService(
  settings: Settings,
  dependencies: ServiceDependencies = {},
): Promise<ProvenanceService> {
  const logger = dependencies.logger ?? silentLogger();
  const http = new HttpClient({
    fetch: dependencies.fetch,
    timeoutMs: settings.timeoutMs,
    userAgent: dependencies.userAgent,
    logger,
  });
  const bundleVerifier =
    dependencies.bundleVerifier ??
    (await SigstoreBundleVerifier.create({
      mirrorUrl: settings.tufMirrorUrl,
      cachePath: settings.tufCachePath,
      timeoutMs: settings.timeoutMs,
      logger,
    }));

  const service = new ProvenanceService({
    concurrency: settings.concurrency,
    logger,
  });
  service.registerVerifier(
    Ecosystem.Npm,
    new NpmVerifier({
      bundleVerifier,
      http,
      registryUrl: settings.npmRegistryUrl,
      logger,
    }),
  );
  service.registerVerifier(
    Ecosystem.PyPI,
    new PypiVerifier({
      bundleVerifier,
      http,
      simpleUrl: settings.pypiSimpleUrl,
      logger,
    }),
  );
  return service;
}
