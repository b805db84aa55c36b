import { loadServerSpec, toPackageIdentifier } from "../spec/spec-loader.js";
import { compareWithSpec } from "../spec/spec-compare.js";
import {
  createRuntime,
  finishCommand,
  type CommandDependencies,
  type CommandResult,
  type CommonCommandOptions,
} from "./runtime.js";

export interface VerifyCommandOptions extends CommonCommandOptions {
  /** Paths of MCP server spec files. */
  readonly specs: readonly string[];
}

export async function runVerifyCommand(
  options: VerifyCommandOptions,
  dependencies: CommandDependencies,
): Promise<CommandResult> {
  const loaded = await Promise.all(options.specs.map((specPath) => loadServerSpec(specPath)));
  const packages = loaded.map((entry) => toPackageIdentifier(entry.spec));

  const { service, logger } = await createRuntime(options, dependencies);
  const outcome = await service.batchVerify(packages, {
    signal: dependencies.signal,
  });
  if (outcome.error) {
    logger.error({ index: outcome.error.index }, outcome.error.message);
  }

  return await finishCommand(
    loaded.map((entry, index) => {
      const result = outcome.results[index];
      return {
        source: entry.path,
        result,
        expectations: compareWithSpec(entry.spec, result),
      };
    }),
    outcome.error !== undefined,
    options,
    dependencies.toolVersion,
  );
}
