import fs from "node:fs/promises";
import path from "node:path";
import type { LevelWithSilent } from "pino";
import { createLogger, type Logger } from "../logging/logger.js";
import { resolveSettings, type Settings } from "../config/settings.js";
import type { FetchLike } from "../http/http-client.js";
import type { BundleVerifier } from "../sigstore/bundle-verifier.js";
import { createProvenanceService } from "../service/factory.js";
import type { ProvenanceService } from "../service/provenance-service.js";
import {
  isAcceptedInStrictMode,
  validateRequirements,
  type ProvenanceRequirements,
} from "../requirements/requirements.js";
import { buildJsonReport } from "../report/json-reporter.js";
import { renderMarkdownReport } from "../report/markdown-reporter.js";
import type { ProvenanceReport, ReportEntry } from "../report/types.js";
import type { ExpectationCheck } from "../spec/spec-compare.js";
import type { ProvenanceResult } from "../provenance/types.js";

export type OutputFormat = "json" | "md";

/** Options every command shares; unset values fall back to the environment. */
export interface CommonCommandOptions {
  readonly format?: OutputFormat;
  readonly out?: string;
  readonly strict?: boolean;
  readonly requirements?: Partial<ProvenanceRequirements>;
  readonly timeout?: string;
  readonly concurrency?: string;
  readonly npmRegistry?: string;
  readonly pypiSimple?: string;
  readonly tufMirror?: string;
  readonly tufCache?: string;
  readonly verbose?: boolean;
  readonly quiet?: boolean;
}

export interface CommandDependencies {
  readonly toolVersion: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly logger?: Logger;
  readonly fetch?: FetchLike;
  readonly bundleVerifier?: BundleVerifier;
  readonly signal?: AbortSignal;
}

export interface CommandResult {
  readonly report: ProvenanceReport;
  readonly output: string;
  /** 0 success, 1 a verification call failed, 2 a gate failed. */
  readonly exitCode: 0 | 1 | 2;
}

export interface CommandRuntime {
  readonly settings: Settings;
  readonly logger: Logger;
  readonly service: ProvenanceService;
}

export async function createRuntime(
  options: CommonCommandOptions,
  dependencies: CommandDependencies,
): Promise<CommandRuntime> {
  const settings = resolveSettings(
    {
      timeoutMs: options.timeout,
      concurrency: options.concurrency,
      npmRegistryUrl: options.npmRegistry,
      pypiSimpleUrl: options.pypiSimple,
      tufMirrorUrl: options.tufMirror,
      tufCachePath: options.tufCache,
      logLevel: cliLogLevel(options),
    },
    dependencies.env,
  );
  const logger =
    dependencies.logger ?? createLogger({ level: settings.logLevel });
  const service = await createProvenanceService(settings, {
    logger,
    fetch: dependencies.fetch,
    bundleVerifier: dependencies.bundleVerifier,
    userAgent: `mcp-provenance/${dependencies.toolVersion}`,
  });
  return { settings, logger, service };
}

function cliLogLevel(options: CommonCommandOptions): LevelWithSilent | undefined {
  if (options.verbose) {
    return "debug";
  }
  if (options.quiet) {
    return "error";
  }
  return undefined;
}

export interface EvaluatedPackage {
  readonly source?: string;
  readonly result: ProvenanceResult;
  readonly expectations?: readonly ExpectationCheck[];
}

/**
 * Apply the strict and requirement gates, render the report and write it to
 * --out when given.
 */
export async function finishCommand(
  packages: readonly EvaluatedPackage[],
  callFailed: boolean,
  options: CommonCommandOptions,
  toolVersion: string,
): Promise<CommandResult> {
  const requirements = activeRequirements(options.requirements);
  const entries: ReportEntry[] = [];
  let gateFailed = false;

  for (const pkg of packages) {
    const expectations = pkg.expectations ?? [];
    if (
      options.strict &&
      (!isAcceptedInStrictMode(pkg.result) ||
        expectations.some((check) => check.outcome === "mismatch"))
    ) {
      gateFailed = true;
    }
    if (!requirements) {
      entries.push({ source: pkg.source, result: pkg.result, expectations });
      continue;
    }
    const checked = validateRequirements(pkg.result, requirements);
    if (!checked.ok) {
      gateFailed = true;
    }
    entries.push({
      source: pkg.source,
      result: pkg.result,
      expectations,
      requirements: checked.ok
        ? { ok: true }
        : { ok: false, message: checked.error.message },
    });
  }

  const report = buildJsonReport({ toolVersion, entries });
  const output =
    (options.format ?? "md") === "json"
      ? JSON.stringify(report, null, 2)
      : renderMarkdownReport(report, { showDetails: Boolean(options.verbose) });

  if (options.out) {
    await fs.mkdir(path.dirname(path.resolve(options.out)), { recursive: true });
    await fs.writeFile(options.out, output + "\n", "utf8");
  }

  return {
    report,
    output,
    exitCode: callFailed ? 1 : gateFailed ? 2 : 0,
  };
}

function activeRequirements(
  input: Partial<ProvenanceRequirements> | undefined,
): ProvenanceRequirements | undefined {
  if (!input) {
    return undefined;
  }
  const requirements: ProvenanceRequirements = {
    requireAttestations: input.requireAttestations ?? false,
    requireTrustedPublisher: input.requireTrustedPublisher ?? false,
    requireSignatures: input.requireSignatures ?? false,
    allowNone: input.allowNone ?? true,
  };
  const active =
    requirements.requireAttestations ||
    requirements.requireTrustedPublisher ||
    requirements.requireSignatures ||
    !requirements.allowNone;
  return active ? requirements : undefined;
}
