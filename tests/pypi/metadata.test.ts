import { describe, expect, it } from "vitest";
import {
  attestationToBundle,
  filenameVersion,
  matchesVersion,
  normalizeProjectName,
  parseProvenanceObject,
  parseSimpleProject,
} from "../../src/pypi/metadata.js";

describe("pypi metadata", () => {
  it("normalizes project names", () => {
    expect(normalizeProjectName("Demo__Tool.Ext")).toBe("demo-tool-ext");
  });

  it("reads the version field of distribution filenames", () => {
    expect(filenameVersion("demo_tool-1.0.0-py3-none-any.whl")).toBe("1.0.0");
    expect(filenameVersion("demo_tool-1.0.0-1-cp312-cp312-linux_x86_64.whl")).toBe(
      "1.0.0",
    );
    expect(filenameVersion("demo-tool-2.1.tar.gz")).toBe("2.1");
    expect(filenameVersion("broken.whl")).toBeUndefined();
    expect(filenameVersion("demo.zip")).toBeUndefined();
    expect(filenameVersion("demo-1.0.0.exe")).toBeUndefined();
  });

  it("matches versions exactly", () => {
    expect(matchesVersion("demo-1.0.0rc1.tar.gz", "1.0.0RC1")).toBe(true);
    expect(matchesVersion("demo-1.0.10.tar.gz", "1.0.1")).toBe(false);
    expect(matchesVersion("demo-11.0.1-py3-none-any.whl", "1.0.1")).toBe(false);
  });

  it("parses simple API files and drops malformed entries", () => {
    expect(
      parseSimpleProject({
        name: "demo",
        files: [
          { filename: "demo-1.0.tar.gz", url: "https://files.test/a", hashes: { sha256: "aa", md5: 1 }, provenance: "" },
          { url: "https://files.test/b" },
          "junk",
        ],
      }),
    ).toEqual({
      name: "demo",
      files: [
        {
          filename: "demo-1.0.tar.gz",
          url: "https://files.test/a",
          hashes: { sha256: "aa" },
          provenance: undefined,
        },
      ],
    });
    expect(() => parseSimpleProject({ name: "demo" })).toThrow(
      "simple API response has no files list",
    );
  });

  it("parses provenance objects", () => {
    expect(
      parseProvenanceObject({
        version: 1,
        attestation_bundles: [
          {
            publisher: { kind: "GitHub", repository: "octo/demo", claims: { ref: "main" } },
            attestations: [{ id: 1 }],
          },
        ],
      }),
    ).toEqual({
      version: 1,
      attestationBundles: [
        {
          publisher: {
            kind: "GitHub",
            repository: "octo/demo",
            workflow: undefined,
            claims: { ref: "main" },
          },
          attestations: [{ id: 1 }],
        },
      ],
    });
    expect(() => parseProvenanceObject({ version: 1 })).toThrow(
      "provenance object has no attestation_bundles",
    );
  });

  it("passes through attestations that already are bundles", () => {
    const bundle = { mediaType: "application/vnd.dev.sigstore.bundle.v0.3+json" };
    expect(attestationToBundle(bundle)).toBe(bundle);
  });

  it("rejects attestations without an envelope", () => {
    expect(() =>
      attestationToBundle({ verification_material: { certificate: "x" } }),
    ).toThrow("attestation lacks verification_material or envelope");
  });
});
