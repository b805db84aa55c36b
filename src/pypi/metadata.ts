import { isRecord } from "../sigstore/subject.js";
import type { DeclaredPublisher } from "../sigstore/publisher.js";

export const SIMPLE_JSON_MEDIA_TYPE = "application/vnd.pypi.simple.v1+json";

export interface SimpleFile {
  readonly filename: string;
  readonly url: string;
  readonly hashes: Readonly<Record<string, string>>;
  readonly provenance?: string;
}

export interface SimpleProject {
  readonly name: string;
  readonly files: readonly SimpleFile[];
}

export interface AttestationBundle {
  readonly publisher: DeclaredPublisher;
  readonly attestations: readonly unknown[];
}

export interface ProvenanceObject {
  readonly version: number;
  readonly attestationBundles: readonly AttestationBundle[];
}

const SIGSTORE_BUNDLE_V03 = "application/vnd.dev.sigstore.bundle.v0.3+json";
const IN_TOTO_PAYLOAD_TYPE = "application/vnd.in-toto+json";

/** PEP 691 project page. */
export function parseSimpleProject(input: unknown): SimpleProject {
  if (!isRecord(input)) {
    throw new Error("simple API response must be an object");
  }
  if (!Array.isArray(input.files)) {
    throw new Error("simple API response has no files list");
  }
  const files: SimpleFile[] = [];
  for (const entry of input.files) {
    if (!isRecord(entry) || typeof entry.filename !== "string") {
      continue;
    }
    files.push({
      filename: entry.filename,
      url: typeof entry.url === "string" ? entry.url : "",
      hashes: stringRecord(entry.hashes),
      provenance:
        typeof entry.provenance === "string" && entry.provenance.length > 0
          ? entry.provenance
          : undefined,
    });
  }
  return {
    name: typeof input.name === "string" ? input.name : "",
    files,
  };
}

/** PEP 740 provenance object. */
export function parseProvenanceObject(input: unknown): ProvenanceObject {
  if (!isRecord(input)) {
    throw new Error("provenance object must be an object");
  }
  if (!Array.isArray(input.attestation_bundles)) {
    throw new Error("provenance object has no attestation_bundles");
  }
  const attestationBundles: AttestationBundle[] = [];
  for (const entry of input.attestation_bundles) {
    if (!isRecord(entry)) {
      continue;
    }
    attestationBundles.push({
      publisher: parsePublisher(entry.publisher),
      attestations: Array.isArray(entry.attestations) ? entry.attestations : [],
    });
  }
  return {
    version: typeof input.version === "number" ? input.version : 0,
    attestationBundles,
  };
}

function parsePublisher(input: unknown): DeclaredPublisher {
  if (!isRecord(input)) {
    return {};
  }
  const claims = isRecord(input.claims) ? input.claims : undefined;
  return {
    kind: typeof input.kind === "string" ? input.kind : undefined,
    repository:
      typeof input.repository === "string" ? input.repository : undefined,
    workflow: typeof input.workflow === "string" ? input.workflow : undefined,
    claims,
  };
}

/**
 * Turn a PEP 740 attestation object into a Sigstore bundle. Objects that
 * already are Sigstore bundles are returned unchanged.
 */
export function attestationToBundle(
  attestation: unknown,
): Record<string, unknown> {
  if (!isRecord(attestation)) {
    throw new Error("attestation must be an object");
  }
  if (typeof attestation.mediaType === "string") {
    return attestation;
  }
  const material = attestation.verification_material;
  const envelope = attestation.envelope;
  if (!isRecord(material) || !isRecord(envelope)) {
    throw new Error("attestation lacks verification_material or envelope");
  }
  if (typeof material.certificate !== "string") {
    throw new Error("attestation verification_material has no certificate");
  }
  if (
    typeof envelope.statement !== "string" ||
    typeof envelope.signature !== "string"
  ) {
    throw new Error("attestation envelope must carry statement and signature");
  }
  return {
    mediaType: SIGSTORE_BUNDLE_V03,
    verificationMaterial: {
      certificate: { rawBytes: material.certificate },
      tlogEntries: Array.isArray(material.transparency_entries)
        ? material.transparency_entries
        : [],
    },
    dsseEnvelope: {
      payload: envelope.statement,
      payloadType: IN_TOTO_PAYLOAD_TYPE,
      signatures: [{ sig: envelope.signature, keyid: "" }],
    },
  };
}

/** PEP 503 normalized project name. */
export function normalizeProjectName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, "-");
}

const SDIST_SUFFIXES = [".tar.gz", ".tar.bz2", ".tar.xz", ".zip", ".tgz"];

/**
 * Version field of a distribution filename: the second dash-separated field
 * of a wheel, or the text after the last dash of an sdist.
 */
export function filenameVersion(filename: string): string | undefined {
  if (filename.endsWith(".whl")) {
    const parts = filename.slice(0, -".whl".length).split("-");
    return parts.length >= 5 ? parts[1] : undefined;
  }
  const suffix = SDIST_SUFFIXES.find((candidate) => filename.endsWith(candidate));
  if (!suffix) {
    return undefined;
  }
  const stem = filename.slice(0, -suffix.length);
  const dash = stem.lastIndexOf("-");
  return dash > 0 ? stem.slice(dash + 1) : undefined;
}

export function matchesVersion(filename: string, version: string): boolean {
  const fileVersion = filenameVersion(filename);
  return (
    fileVersion !== undefined &&
    fileVersion.toLowerCase() === version.toLowerCase()
  );
}

function stringRecord(input: unknown): Record<string, string> {
  const output: Record<string, string> = {};
  if (!isRecord(input)) {
    return output;
  }
  for (const [key, value] of Object.entries(input)) {
    if (typeof value === "string") {
      output[key] = value;
    }
  }
  return output;
}
