import crypto from "node:crypto";
import { describe, expect, it } from "vitest";
import { checkSubjectDigest, parseStatement } from "../../src/sigstore/subject.js";

const artifactHex = crypto.createHash("sha512").update("artifact").digest("hex");
const artifactDigest = Buffer.from(artifactHex, "hex");

function dsse(statement: unknown) {
  return {
    $case: "dsseEnvelope" as const,
    dsseEnvelope: { payload: Buffer.from(JSON.stringify(statement)) },
  };
}

const statement = {
  _type: "https://in-toto.io/Statement/v1",
  subject: [{ name: "pkg:npm/demo@1.0.0", digest: { sha512: artifactHex } }],
  predicateType: "https://slsa.dev/provenance/v1",
  predicate: { buildType: "test" },
};

describe("subject digest check", () => {
  it("accepts a statement whose subject matches the artifact", () => {
    const checked = checkSubjectDigest(dsse(statement), "sha512", artifactDigest);

    expect(checked).toEqual({
      ok: true,
      value: {
        statement: {
          _type: "https://in-toto.io/Statement/v1",
          subject: [
            { name: "pkg:npm/demo@1.0.0", digest: { sha512: artifactHex } },
          ],
          predicateType: "https://slsa.dev/provenance/v1",
          predicate: { buildType: "test" },
        },
      },
    });
  });

  it("compares subject digests case-insensitively", () => {
    const upper = {
      ...statement,
      subject: [{ digest: { sha512: artifactHex.toUpperCase() } }],
    };

    expect(checkSubjectDigest(dsse(upper), "sha512", artifactDigest).ok).toBe(true);
  });

  it("rejects a statement for another artifact", () => {
    const otherDigest = crypto.createHash("sha512").update("other").digest();
    const checked = checkSubjectDigest(dsse(statement), "sha512", otherDigest);

    expect(checked.ok).toBe(false);
    if (!checked.ok) {
      expect(checked.error.message).toBe(
        `no statement subject matches artifact sha512:${otherDigest.toString("hex")}`,
      );
    }
  });

  it("rejects a subject recorded under another algorithm", () => {
    const sha256Only = {
      ...statement,
      subject: [{ digest: { sha256: artifactHex } }],
    };

    expect(checkSubjectDigest(dsse(sha256Only), "sha512", artifactDigest).ok).toBe(
      false,
    );
  });

  it("checks message signature digests directly", () => {
    const content = {
      $case: "messageSignature" as const,
      messageSignature: { messageDigest: { digest: artifactDigest } },
    };

    expect(checkSubjectDigest(content, "sha512", artifactDigest)).toEqual({
      ok: true,
      value: {},
    });
  });

  it("fails without signed content", () => {
    const checked = checkSubjectDigest(undefined, "sha512", artifactDigest);

    expect(checked.ok).toBe(false);
    if (!checked.ok) {
      expect(checked.error.message).toBe("bundle has no signed content");
    }
  });

  it("rejects payloads that are not in-toto statements", () => {
    const notJson = parseStatement(Buffer.from("not json"));
    const noSubject = parseStatement(Buffer.from(JSON.stringify({ foo: 1 })));

    expect(notJson.ok).toBe(false);
    if (!notJson.ok) {
      expect(notJson.error.message).toBe("DSSE payload is not JSON");
    }
    expect(noSubject.ok).toBe(false);
    if (!noSubject.ok) {
      expect(noSubject.error.message).toBe(
        "DSSE payload is not an in-toto statement",
      );
    }
  });
});
