import { isRecord } from "../sigstore/subject.js";

export interface NpmDist {
  readonly tarball?: string;
  readonly shasum?: string;
  readonly integrity?: string;
  /** Present (in any shape) for packages published with provenance. */
  readonly attestations?: unknown;
  /** Legacy ECDSA registry signatures. */
  readonly signatures?: unknown;
}

export interface NpmVersionMetadata {
  readonly version: string;
  readonly dist: NpmDist;
  readonly repository?: unknown;
}

export interface NpmPackageMetadata {
  readonly name: string;
  readonly versions: ReadonlyMap<string, NpmVersionMetadata>;
  readonly repository?: unknown;
}

export interface NpmAttestation {
  readonly predicateType?: string;
  readonly bundle: Record<string, unknown>;
}

const SLSA_PROVENANCE_PREFIX = "https://slsa.dev/provenance/";

export function parsePackageMetadata(input: unknown): NpmPackageMetadata {
  if (!isRecord(input)) {
    throw new Error("registry document must be an object");
  }
  const versions = new Map<string, NpmVersionMetadata>();
  if (isRecord(input.versions)) {
    for (const [version, entry] of Object.entries(input.versions)) {
      if (!isRecord(entry)) {
        continue;
      }
      versions.set(version, {
        version,
        dist: parseDist(entry.dist),
        repository: entry.repository,
      });
    }
  }
  return {
    name: typeof input.name === "string" ? input.name : "",
    versions,
    repository: input.repository,
  };
}

function parseDist(input: unknown): NpmDist {
  if (!isRecord(input)) {
    return {};
  }
  return {
    tarball: typeof input.tarball === "string" ? input.tarball : undefined,
    shasum: typeof input.shasum === "string" ? input.shasum : undefined,
    integrity: typeof input.integrity === "string" ? input.integrity : undefined,
    attestations: isPresent(input.attestations) ? input.attestations : undefined,
    signatures: isPresent(input.signatures) ? input.signatures : undefined,
  };
}

function isPresent(value: unknown): boolean {
  if (value === undefined || value === null) {
    return false;
  }
  return !Array.isArray(value) || value.length > 0;
}

/** `repository` may be a string shorthand or `{ type, url }`. */
export function repositoryUrl(repository: unknown): string | undefined {
  if (typeof repository === "string" && repository.length > 0) {
    return repository;
  }
  if (isRecord(repository) && typeof repository.url === "string") {
    return repository.url;
  }
  return undefined;
}

export function attestationsUrl(attestations: unknown): string | undefined {
  if (isRecord(attestations) && typeof attestations.url === "string") {
    return attestations.url;
  }
  return undefined;
}

/**
 * Pick the Sigstore bundle to verify out of an attestations document. The
 * document is either a bare bundle or `{ attestations: [{ predicateType,
 * bundle }] }`; the SLSA provenance attestation is preferred over publish
 * attestations.
 */
export function selectAttestation(document: unknown): NpmAttestation {
  if (!isRecord(document)) {
    throw new Error("attestations must be an object");
  }
  if (typeof document.mediaType === "string") {
    return { bundle: document };
  }
  if (!Array.isArray(document.attestations)) {
    throw new Error("attestations document has no bundles");
  }
  const candidates: NpmAttestation[] = [];
  for (const entry of document.attestations) {
    if (isRecord(entry) && isRecord(entry.bundle)) {
      candidates.push({
        predicateType:
          typeof entry.predicateType === "string"
            ? entry.predicateType
            : undefined,
        bundle: entry.bundle,
      });
    }
  }
  const provenance = candidates.find((candidate) =>
    candidate.predicateType?.startsWith(SLSA_PROVENANCE_PREFIX),
  );
  const selected = provenance ?? candidates[0];
  if (!selected) {
    throw new Error("attestations document has no bundles");
  }
  return selected;
}

/** URL path segment for a package name; scopes keep the leading @. */
export function encodePackageName(name: string): string {
  return name.startsWith("@")
    ? `@${encodeURIComponent(name.slice(1))}`
    : encodeURIComponent(name);
}
