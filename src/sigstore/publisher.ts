import type { TrustedPublisher } from "../provenance/types.js";
import type { BundleVerification } from "./bundle-verifier.js";
import { isRecord, type InTotoStatement } from "./subject.js";

export const VERIFIED_PUBLISHER_KIND = "Verified";

/**
 * Publisher record backed only by the verification itself. Repository and
 * workflow are left to the ecosystem metadata, which callers merge in with
 * mergePublisher.
 */
export function extractPublisherInfo(
  verification: BundleVerification | undefined,
): TrustedPublisher | undefined {
  if (!verification) {
    return undefined;
  }
  const claims: Record<string, unknown> = {};
  if (verification.identity.issuer) {
    claims.issuer = verification.identity.issuer;
  }
  if (verification.identity.subjectAlternativeName) {
    claims.subjectAlternativeName =
      verification.identity.subjectAlternativeName;
  }
  return {
    kind: VERIFIED_PUBLISHER_KIND,
    repository: "",
    claims,
  };
}

export interface DeclaredPublisher {
  readonly kind?: string;
  readonly repository?: string;
  readonly workflow?: string;
  readonly claims?: Readonly<Record<string, unknown>>;
}

/** Declared values win; gaps are filled from the extracted record. */
export function mergePublisher(
  declared: DeclaredPublisher | undefined,
  extracted: TrustedPublisher | undefined,
): TrustedPublisher | undefined {
  if (!declared && !extracted) {
    return undefined;
  }
  const workflow = declared?.workflow || extracted?.workflow;
  return {
    kind: declared?.kind || extracted?.kind || VERIFIED_PUBLISHER_KIND,
    repository: declared?.repository || extracted?.repository || "",
    ...(workflow ? { workflow } : {}),
    claims: { ...extracted?.claims, ...declared?.claims },
  };
}

const GITHUB_REPOSITORY_URL = /^(?:git\+)?https:\/\/github\.com\/([^/]+\/[^/#@]+?)(?:\.git)?(?:[/#@].*)?$/;

/**
 * Read the build workflow out of a SLSA provenance statement (v1 or v0.2)
 * produced by GitHub Actions.
 */
export function publisherFromStatement(
  statement: InTotoStatement | undefined,
): DeclaredPublisher | undefined {
  if (!statement || !isRecord(statement.predicate)) {
    return undefined;
  }
  const predicate = statement.predicate;

  const buildDefinition = predicate.buildDefinition;
  if (isRecord(buildDefinition) && isRecord(buildDefinition.externalParameters)) {
    const workflow = buildDefinition.externalParameters.workflow;
    if (isRecord(workflow) && typeof workflow.repository === "string") {
      const repository = parseGitHubRepository(workflow.repository);
      if (repository) {
        return {
          kind: "GitHub",
          repository,
          workflow: typeof workflow.path === "string" ? workflow.path : undefined,
          claims:
            typeof workflow.ref === "string" ? { ref: workflow.ref } : undefined,
        };
      }
    }
  }

  const invocation = predicate.invocation;
  if (isRecord(invocation) && isRecord(invocation.configSource)) {
    const source = invocation.configSource;
    if (typeof source.uri === "string") {
      const repository = parseGitHubRepository(source.uri);
      if (repository) {
        return {
          kind: "GitHub",
          repository,
          workflow:
            typeof source.entryPoint === "string" ? source.entryPoint : undefined,
        };
      }
    }
  }

  return undefined;
}

export function parseGitHubRepository(url: string): string | undefined {
  const match = GITHUB_REPOSITORY_URL.exec(url);
  return match?.[1];
}
