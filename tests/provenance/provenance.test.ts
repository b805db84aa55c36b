import { describe, expect, it } from "vitest";
import {
  Ecosystem,
  ProvenanceStatus,
  createResult,
  formatPackage,
  isEcosystem,
} from "../../src/provenance/types.js";
import {
  BundleVerificationError,
  ProvenanceError,
  VersionNotFoundError,
  errorMessage,
  toError,
} from "../../src/provenance/errors.js";
import { isLogLevel } from "../../src/logging/logger.js";

const pkg = { ecosystem: Ecosystem.PyPI, name: "demo-tool", version: "1.0.0" };

describe("provenance types", () => {
  it("formats package identifiers", () => {
    expect(formatPackage(pkg)).toBe("pypi:demo-tool@1.0.0");
  });

  it("recognizes ecosystems", () => {
    expect(isEcosystem("npm")).toBe(true);
    expect(isEcosystem("go")).toBe(true);
    expect(isEcosystem("cargo")).toBe(false);
  });

  it("fills result defaults", () => {
    expect(createResult(pkg, { status: ProvenanceStatus.None })).toEqual({
      packageId: pkg,
      status: ProvenanceStatus.None,
      hasAttestations: false,
      attestationCount: 0,
      hasSignatures: false,
      details: {},
    });
  });
});

describe("provenance errors", () => {
  it("carries a code and the concrete class name", () => {
    const error = new VersionNotFoundError("demo-tool", "9.9.9");

    expect(error).toBeInstanceOf(ProvenanceError);
    expect(error.code).toBe("VERSION_NOT_FOUND");
    expect(error.name).toBe("VersionNotFoundError");
    expect(error.message).toBe("version 9.9.9 not found for package demo-tool");
  });

  it("prefixes bundle failures with their reason", () => {
    const error = new BundleVerificationError("missing-sct", "expected 1 SCT");

    expect(error.reason).toBe("missing-sct");
    expect(error.message).toBe("missing-sct: expected 1 SCT");
  });

  it("normalizes thrown values", () => {
    const original = new Error("boom");

    expect(toError(original, "fallback")).toBe(original);
    expect(toError("boom", "fallback").message).toBe("fallback");
    expect(errorMessage(42)).toBe("42");
  });

  it("validates log levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
