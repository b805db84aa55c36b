import { describe, expect, it } from "vitest";
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_NPM_REGISTRY,
  DEFAULT_PYPI_SIMPLE,
  DEFAULT_TIMEOUT_MS,
  resolveSettings,
} from "../../src/config/settings.js";
import { ConfigError } from "../../src/provenance/errors.js";

describe("settings", () => {
  it("uses defaults without overrides or environment", () => {
    expect(resolveSettings({}, {})).toEqual({
      npmRegistryUrl: DEFAULT_NPM_REGISTRY,
      pypiSimpleUrl: DEFAULT_PYPI_SIMPLE,
      timeoutMs: DEFAULT_TIMEOUT_MS,
      concurrency: DEFAULT_CONCURRENCY,
      tufMirrorUrl: undefined,
      tufCachePath: undefined,
      logLevel: "warn",
    });
  });

  it("reads the environment", () => {
    const settings = resolveSettings(
      {},
      {
        MCP_PROVENANCE_NPM_REGISTRY: "https://npm.mirror.test/",
        MCP_PROVENANCE_TIMEOUT_MS: "1500",
        MCP_PROVENANCE_CONCURRENCY: "0",
        MCP_PROVENANCE_TUF_CACHE: "/tmp/tuf",
        MCP_PROVENANCE_LOG_LEVEL: "debug",
      },
    );

    expect(settings).toMatchObject({
      npmRegistryUrl: "https://npm.mirror.test",
      timeoutMs: 1500,
      concurrency: 0,
      tufCachePath: "/tmp/tuf",
      logLevel: "debug",
    });
  });

  it("lets overrides win over the environment", () => {
    const settings = resolveSettings(
      { timeoutMs: "250", logLevel: "error" },
      { MCP_PROVENANCE_TIMEOUT_MS: "1500", MCP_PROVENANCE_LOG_LEVEL: "debug" },
    );

    expect(settings.timeoutMs).toBe(250);
    expect(settings.logLevel).toBe("error");
  });

  it("ignores empty values", () => {
    expect(
      resolveSettings({ timeoutMs: "" }, { MCP_PROVENANCE_TIMEOUT_MS: "" }).timeoutMs,
    ).toBe(DEFAULT_TIMEOUT_MS);
  });

  it("reports every invalid value at once", () => {
    let caught: unknown;
    try {
      resolveSettings(
        { timeoutMs: "0", concurrency: "-1" },
        {
          MCP_PROVENANCE_PYPI_SIMPLE: "ftp://pypi.test",
          MCP_PROVENANCE_LOG_LEVEL: "loud",
        },
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toHaveProperty(
      "message",
      "Invalid settings: PyPI simple URL must use http or https, got 'ftp://pypi.test'; " +
        "timeout must be an integer >= 1, got '0'; " +
        "concurrency must be an integer >= 0, got '-1'; " +
        "log level must be one of fatal|error|warn|info|debug|trace|silent, got 'loud'",
    );
  });

  it("rejects URLs that do not parse", () => {
    expect(() => resolveSettings({ tufMirrorUrl: "not a url" }, {})).toThrow(
      "Invalid settings: TUF mirror URL is not a valid URL: 'not a url'",
    );
  });
});
