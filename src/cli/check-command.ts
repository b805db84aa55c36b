import { ConfigError } from "../provenance/errors.js";
import { ECOSYSTEMS, isEcosystem } from "../provenance/types.js";
import {
  createRuntime,
  finishCommand,
  type CommandDependencies,
  type CommandResult,
  type CommonCommandOptions,
} from "./runtime.js";

export interface CheckCommandOptions extends CommonCommandOptions {
  readonly ecosystem: string;
  readonly name: string;
  readonly version: string;
}

/** Verify a single package named on the command line. */
export async function runCheckCommand(
  options: CheckCommandOptions,
  dependencies: CommandDependencies,
): Promise<CommandResult> {
  const ecosystem = options.ecosystem.toLowerCase();
  if (!isEcosystem(ecosystem)) {
    throw new ConfigError(
      `Unsupported ecosystem '${options.ecosystem}'; expected one of ${ECOSYSTEMS.join(", ")}`,
    );
  }
  if (!options.name.trim() || !options.version.trim()) {
    throw new ConfigError("Package name and version must not be empty");
  }

  const { service } = await createRuntime(options, dependencies);
  const outcome = await service.verifyProvenance(
    { ecosystem, name: options.name, version: options.version },
    { signal: dependencies.signal },
  );

  return await finishCommand(
    [{ result: outcome.result }],
    outcome.error !== undefined,
    options,
    dependencies.toolVersion,
  );
}
