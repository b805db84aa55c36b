import type { Result } from "../provenance/types.js";

export interface InTotoSubject {
  readonly name?: string;
  readonly digest: Readonly<Record<string, string>>;
}

export interface InTotoStatement {
  readonly _type?: string;
  readonly subject: readonly InTotoSubject[];
  readonly predicateType?: string;
  readonly predicate?: unknown;
}

/**
 * Structural view of a parsed bundle's signed content, wide enough to accept
 * the @sigstore/bundle types without depending on their exact shape.
 */
export type SignedContent =
  | {
      readonly $case: "dsseEnvelope";
      readonly dsseEnvelope: { readonly payload: Uint8Array };
    }
  | {
      readonly $case: "messageSignature";
      readonly messageSignature: {
        readonly messageDigest?: { readonly digest: Uint8Array };
      };
    };

export interface SubjectCheck {
  readonly statement?: InTotoStatement;
}

/**
 * Confirm that the bundle attests to the given artifact digest. DSSE bundles
 * must carry an in-toto statement with a matching subject; message
 * signatures must carry a matching message digest.
 */
export function checkSubjectDigest(
  content: SignedContent | undefined,
  algorithm: string,
  digest: Uint8Array,
): Result<SubjectCheck> {
  if (!content) {
    return { ok: false, error: new Error("bundle has no signed content") };
  }
  const expectedHex = Buffer.from(digest).toString("hex");

  if (content.$case === "messageSignature") {
    const actual = content.messageSignature.messageDigest?.digest;
    if (!actual) {
      return { ok: false, error: new Error("message signature has no digest") };
    }
    const actualHex = Buffer.from(actual).toString("hex");
    if (actualHex !== expectedHex) {
      return {
        ok: false,
        error: new Error(
          `message digest ${actualHex} does not match artifact ${algorithm}:${expectedHex}`,
        ),
      };
    }
    return { ok: true, value: {} };
  }

  const parsed = parseStatement(content.dsseEnvelope.payload);
  if (!parsed.ok) {
    return parsed;
  }
  const statement = parsed.value;
  const matched = statement.subject.some(
    (subject) => subject.digest[algorithm]?.toLowerCase() === expectedHex,
  );
  if (!matched) {
    return {
      ok: false,
      error: new Error(
        `no statement subject matches artifact ${algorithm}:${expectedHex}`,
      ),
    };
  }
  return { ok: true, value: { statement } };
}

export function parseStatement(payload: Uint8Array): Result<InTotoStatement> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(payload).toString("utf8"));
  } catch {
    return { ok: false, error: new Error("DSSE payload is not JSON") };
  }
  if (!isRecord(decoded) || !Array.isArray(decoded.subject)) {
    return {
      ok: false,
      error: new Error("DSSE payload is not an in-toto statement"),
    };
  }

  const subject: InTotoSubject[] = [];
  for (const entry of decoded.subject) {
    if (!isRecord(entry) || !isRecord(entry.digest)) {
      continue;
    }
    const digest: Record<string, string> = {};
    for (const [key, value] of Object.entries(entry.digest)) {
      if (typeof value === "string") {
        digest[key] = value;
      }
    }
    subject.push({
      name: typeof entry.name === "string" ? entry.name : undefined,
      digest,
    });
  }

  return {
    ok: true,
    value: {
      _type: typeof decoded._type === "string" ? decoded._type : undefined,
      subject,
      predicateType:
        typeof decoded.predicateType === "string"
          ? decoded.predicateType
          : undefined,
      predicate: decoded.predicate,
    },
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
