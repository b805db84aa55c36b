import { describe, expect, it } from "vitest";
import {
  defaultRequirements,
  isAcceptedInStrictMode,
  validateRequirements,
} from "../../src/requirements/requirements.js";
import {
  Ecosystem,
  ProvenanceStatus,
  createResult,
} from "../../src/provenance/types.js";

const pkg = { ecosystem: Ecosystem.Npm, name: "demo", version: "1.0.0" };

const verified = createResult(pkg, {
  status: ProvenanceStatus.Verified,
  hasAttestations: true,
  attestationCount: 1,
  trustedPublisher: { kind: "GitHub", repository: "octo/demo", claims: {} },
});
const none = createResult(pkg, { status: ProvenanceStatus.None });
const signatures = createResult(pkg, {
  status: ProvenanceStatus.Signatures,
  hasSignatures: true,
});

describe("provenance requirements", () => {
  it("accepts everything by default", () => {
    expect(validateRequirements(none, defaultRequirements())).toEqual({
      ok: true,
      value: undefined,
    });
  });

  it("accepts a verified package under every requirement", () => {
    expect(
      validateRequirements(verified, {
        requireAttestations: true,
        requireTrustedPublisher: true,
        requireSignatures: true,
        allowNone: false,
      }).ok,
    ).toBe(true);
  });

  it("lists every unmet requirement", () => {
    const checked = validateRequirements(none, {
      requireAttestations: true,
      requireTrustedPublisher: true,
      requireSignatures: false,
      allowNone: false,
    });

    expect(checked.ok).toBe(false);
    if (!checked.ok) {
      expect(checked.error.message).toBe(
        "Provenance requirements not met: attestations are required but none were found; " +
          "a trusted publisher is required but none was established; " +
          "package has no provenance information",
      );
    }
  });

  it("counts attestations as signatures", () => {
    const attested = createResult(pkg, {
      status: ProvenanceStatus.Attestations,
      hasAttestations: true,
    });
    const requirements = { ...defaultRequirements(), requireSignatures: true };

    expect(validateRequirements(attested, requirements).ok).toBe(true);
    expect(validateRequirements(signatures, requirements).ok).toBe(true);
    expect(validateRequirements(none, requirements).ok).toBe(false);
  });

  it("treats errors as unmet when anything is required", () => {
    const failed = createResult(pkg, {
      status: ProvenanceStatus.Error,
      errorMessage: "connection refused",
    });

    const checked = validateRequirements(failed, {
      ...defaultRequirements(),
      allowNone: false,
    });

    expect(checked.ok).toBe(false);
    if (!checked.ok) {
      expect(checked.error.message).toBe(
        "Provenance requirements not met: provenance could not be determined (ERROR: connection refused)",
      );
    }
  });

  it("accepts a trusted publisher status without a publisher record", () => {
    const trusted = createResult(pkg, { status: ProvenanceStatus.TrustedPublisher });

    expect(
      validateRequirements(trusted, {
        ...defaultRequirements(),
        requireTrustedPublisher: true,
      }).ok,
    ).toBe(true);
  });

  it("only accepts cryptographic outcomes in strict mode", () => {
    expect(isAcceptedInStrictMode(verified)).toBe(true);
    expect(
      isAcceptedInStrictMode(
        createResult(pkg, { status: ProvenanceStatus.Attestations, hasAttestations: true }),
      ),
    ).toBe(true);
    expect(isAcceptedInStrictMode(signatures)).toBe(false);
    expect(isAcceptedInStrictMode(none)).toBe(false);
  });
});
