import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  loadServerSpec,
  toPackageIdentifier,
  validateServerSpec,
} from "../../src/spec/spec-loader.js";
import { ConfigError } from "../../src/provenance/errors.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "mcp-provenance-spec-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

const SPEC_YAML = [
  "metadata:",
  "  name: demo-server",
  "  description: Demo MCP server",
  "  protocol: npx",
  "spec:",
  "  package: \"@octo/demo-mcp\"",
  "  version: 1.2.0",
  "provenance:",
  "  repository_uri: https://github.com/octo/demo",
  "  attestations:",
  "    available: true",
  "    publisher:",
  "      kind: GitHub",
  "      repository: octo/demo",
  "build:",
  "  base_image: node:20",
  "",
].join("\n");

describe("server spec loader", () => {
  it("loads a spec file", async () => {
    const specPath = path.join(tempDir, "demo.yaml");
    await fs.writeFile(specPath, SPEC_YAML, "utf8");

    const loaded = await loadServerSpec(specPath);

    expect(loaded).toEqual({
      path: specPath,
      spec: {
        metadata: {
          name: "demo-server",
          description: "Demo MCP server",
          protocol: "npx",
        },
        spec: { package: "@octo/demo-mcp", version: "1.2.0" },
        provenance: {
          repository_uri: "https://github.com/octo/demo",
          attestations: {
            available: true,
            publisher: { kind: "GitHub", repository: "octo/demo" },
          },
        },
      },
    });
    expect(toPackageIdentifier(loaded.spec)).toEqual({
      ecosystem: "npm",
      name: "@octo/demo-mcp",
      version: "1.2.0",
    });
  });

  it("maps protocols to ecosystems", () => {
    const uvx = validateServerSpec({
      metadata: { name: "py", protocol: "uvx" },
      spec: { package: "demo-tool", version: "2" },
    });
    const go = validateServerSpec({
      metadata: { name: "go", protocol: "go" },
      spec: { package: "example.test/mod", version: "v0.1.0" },
    });

    expect(toPackageIdentifier(uvx)).toEqual({
      ecosystem: "pypi",
      name: "demo-tool",
      version: "2",
    });
    expect(toPackageIdentifier(go).ecosystem).toBe("go");
  });

  it("collects every validation problem", () => {
    expect(() =>
      validateServerSpec(
        {
          metadata: { protocol: "docker" },
          spec: { package: "demo", version: "" },
          provenance: { attestations: { available: "yes" }, signed: true },
        },
        "bad.yaml",
      ),
    ).toThrow(
      new ConfigError(
        "Invalid spec bad.yaml: metadata.name must be a non-empty string; " +
          "metadata.protocol must be one of npx|uvx|go; " +
          "spec.version must be a non-empty string; " +
          "provenance contains unsupported field 'signed'; " +
          "provenance.attestations.available must be a boolean",
      ),
    );
  });

  it("rejects unquoted numeric versions", async () => {
    const specPath = path.join(tempDir, "numeric.yaml");
    await fs.writeFile(
      specPath,
      SPEC_YAML.replace("  version: 1.2.0", "  version: 2.0"),
      "utf8",
    );

    await expect(loadServerSpec(specPath)).rejects.toThrow(
      new ConfigError(
        `Invalid spec ${specPath}: spec.version must be a quoted string`,
      ),
    );
  });

  it("keeps quoted versions as written", async () => {
    const specPath = path.join(tempDir, "quoted.yaml");
    await fs.writeFile(
      specPath,
      SPEC_YAML.replace("  version: 1.2.0", '  version: "1.10"'),
      "utf8",
    );

    const loaded = await loadServerSpec(specPath);

    expect(toPackageIdentifier(loaded.spec).version).toBe("1.10");
  });

  it("reports unreadable files", async () => {
    const missing = path.join(tempDir, "missing.yaml");

    await expect(loadServerSpec(missing)).rejects.toThrow(
      `Could not read spec file at ${missing}`,
    );
  });

  it("reports invalid YAML", async () => {
    const specPath = path.join(tempDir, "broken.yaml");
    await fs.writeFile(specPath, "metadata: [unclosed\n", "utf8");

    await expect(loadServerSpec(specPath)).rejects.toThrow(
      `Spec file ${specPath} is not valid YAML`,
    );
  });
});
