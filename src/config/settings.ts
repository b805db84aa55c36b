import { ConfigError } from "../provenance/errors.js";
import { isLogLevel } from "../logging/logger.js";
import type { LevelWithSilent } from "pino";

export const DEFAULT_NPM_REGISTRY = "https://registry.npmjs.org";
export const DEFAULT_PYPI_SIMPLE = "https://pypi.org/simple";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_CONCURRENCY = 8;

export interface Settings {
  readonly npmRegistryUrl: string;
  readonly pypiSimpleUrl: string;
  readonly timeoutMs: number;
  /** 0 means one task per package with no bound. */
  readonly concurrency: number;
  readonly tufMirrorUrl?: string;
  readonly tufCachePath?: string;
  readonly logLevel: LevelWithSilent;
}

export interface SettingsOverrides {
  readonly npmRegistryUrl?: string;
  readonly pypiSimpleUrl?: string;
  readonly timeoutMs?: string | number;
  readonly concurrency?: string | number;
  readonly tufMirrorUrl?: string;
  readonly tufCachePath?: string;
  readonly logLevel?: string;
}

const ENV = {
  npmRegistryUrl: "MCP_PROVENANCE_NPM_REGISTRY",
  pypiSimpleUrl: "MCP_PROVENANCE_PYPI_SIMPLE",
  timeoutMs: "MCP_PROVENANCE_TIMEOUT_MS",
  concurrency: "MCP_PROVENANCE_CONCURRENCY",
  tufMirrorUrl: "MCP_PROVENANCE_TUF_MIRROR",
  tufCachePath: "MCP_PROVENANCE_TUF_CACHE",
  logLevel: "MCP_PROVENANCE_LOG_LEVEL",
} as const;

/**
 * Resolve settings with precedence overrides > environment > defaults.
 * Every invalid value is reported in a single ConfigError.
 */
export function resolveSettings(
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): Settings {
  const errors: string[] = [];
  const pick = (key: keyof typeof ENV): string | number | undefined => {
    const override = overrides[key];
    if (override !== undefined && override !== "") {
      return override;
    }
    const fromEnv = env[ENV[key]];
    return fromEnv !== undefined && fromEnv !== "" ? fromEnv : undefined;
  };

  const npmRegistryUrl = parseUrl(
    pick("npmRegistryUrl") ?? DEFAULT_NPM_REGISTRY,
    "npm registry URL",
    errors,
  );
  const pypiSimpleUrl = parseUrl(
    pick("pypiSimpleUrl") ?? DEFAULT_PYPI_SIMPLE,
    "PyPI simple URL",
    errors,
  );
  const timeoutMs = parseInteger(
    pick("timeoutMs") ?? DEFAULT_TIMEOUT_MS,
    "timeout",
    1,
    errors,
  );
  const concurrency = parseInteger(
    pick("concurrency") ?? DEFAULT_CONCURRENCY,
    "concurrency",
    0,
    errors,
  );
  const tufMirror = pick("tufMirrorUrl");
  const tufMirrorUrl =
    tufMirror === undefined
      ? undefined
      : parseUrl(tufMirror, "TUF mirror URL", errors);
  const tufCache = pick("tufCachePath");
  const logLevelInput = String(pick("logLevel") ?? "warn");
  let logLevel: LevelWithSilent = "warn";
  if (isLogLevel(logLevelInput)) {
    logLevel = logLevelInput;
  } else {
    errors.push(`log level must be one of fatal|error|warn|info|debug|trace|silent, got '${logLevelInput}'`);
  }

  if (errors.length > 0) {
    throw new ConfigError(`Invalid settings: ${errors.join("; ")}`);
  }

  return {
    npmRegistryUrl,
    pypiSimpleUrl,
    timeoutMs,
    concurrency,
    tufMirrorUrl,
    tufCachePath: tufCache === undefined ? undefined : String(tufCache),
    logLevel,
  };
}

function parseUrl(
  value: string | number,
  label: string,
  errors: string[],
): string {
  const raw = String(value);
  try {
    const url = new URL(raw);
    if (url.protocol !== "https:" && url.protocol !== "http:") {
      errors.push(`${label} must use http or https, got '${raw}'`);
    }
  } catch {
    errors.push(`${label} is not a valid URL: '${raw}'`);
  }
  return raw.replace(/\/+$/, "");
}

function parseInteger(
  value: string | number,
  label: string,
  minimum: number,
  errors: string[],
): number {
  const parsed = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < minimum) {
    errors.push(`${label} must be an integer >= ${minimum}, got '${value}'`);
    return minimum;
  }
  return parsed;
}
