#!/usr/bin/env node
import { Command, Option } from "commander";
import { runCheckCommand } from "./check-command.js";
import { runVerifyCommand } from "./verify-command.js";
import { loadToolVersion } from "./runtime-paths.js";
import type { CommandResult, CommonCommandOptions, OutputFormat } from "./runtime.js";

interface RawOptions {
  format: string;
  out?: string;
  strict?: boolean;
  requireAttestations?: boolean;
  requireTrustedPublisher?: boolean;
  requireSignatures?: boolean;
  allowNone: boolean;
  timeout?: string;
  concurrency?: string;
  npmRegistry?: string;
  pypiSimple?: string;
  tufMirror?: string;
  tufCache?: string;
  verbose?: boolean;
  quiet?: boolean;
}

const program = new Command();
const toolVersion = await loadToolVersion();

program
  .name("mcp-provenance")
  .description("Verify the supply-chain provenance of MCP server packages")
  .version(toolVersion);

withSharedOptions(
  program
    .command("verify")
    .description("Verify the packages named by one or more MCP server spec files")
    .argument("<spec...>", "Spec file paths"),
).action(async (specs: string[], options: RawOptions) => {
  await execute(() =>
    runVerifyCommand(
      { ...toCommonOptions(options), specs },
      { toolVersion },
    ),
    options.out,
  );
});

withSharedOptions(
  program
    .command("check")
    .description("Verify a single package")
    .argument("<ecosystem>", "npm | pypi | go")
    .argument("<name>", "Package name")
    .argument("<version>", "Exact version"),
).action(
  async (ecosystem: string, name: string, version: string, options: RawOptions) => {
    await execute(() =>
      runCheckCommand(
        { ...toCommonOptions(options), ecosystem, name, version },
        { toolVersion },
      ),
      options.out,
    );
  },
);

function withSharedOptions(command: Command): Command {
  return command
    .addOption(
      new Option("--format <format>", "Output format").choices(["md", "json"]).default("md"),
    )
    .option("--out <file>", "Write report to file")
    .option("--strict", "Exit 2 unless every package has verified or attested provenance")
    .option("--require-attestations", "Require attestations")
    .option("--require-trusted-publisher", "Require a trusted publisher")
    .option("--require-signatures", "Require signatures or attestations")
    .option("--no-allow-none", "Fail packages without any provenance")
    .option("--timeout <ms>", "Per-request timeout in milliseconds")
    .option("--concurrency <number>", "Maximum parallel verifications (0 = unbounded)")
    .option("--npm-registry <url>", "npm registry base URL")
    .option("--pypi-simple <url>", "PyPI simple index base URL")
    .option("--tuf-mirror <url>", "Sigstore TUF mirror URL")
    .option("--tuf-cache <path>", "Sigstore TUF cache directory")
    .option("--verbose", "Verbose output")
    .option("--quiet", "Only log errors");
}

function toCommonOptions(options: RawOptions): CommonCommandOptions {
  return {
    format: parseFormat(options.format),
    out: options.out,
    strict: Boolean(options.strict),
    requirements: {
      requireAttestations: Boolean(options.requireAttestations),
      requireTrustedPublisher: Boolean(options.requireTrustedPublisher),
      requireSignatures: Boolean(options.requireSignatures),
      allowNone: options.allowNone,
    },
    timeout: options.timeout,
    concurrency: options.concurrency,
    npmRegistry: options.npmRegistry,
    pypiSimple: options.pypiSimple,
    tufMirror: options.tufMirror,
    tufCache: options.tufCache,
    verbose: Boolean(options.verbose),
    quiet: Boolean(options.quiet),
  };
}

function parseFormat(value: string): OutputFormat {
  if (value === "json" || value === "md") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

async function execute(
  run: () => Promise<CommandResult>,
  out: string | undefined,
): Promise<void> {
  try {
    const result = await run();
    if (!out) {
      await writeStdout(result.output + "\n");
    }
    process.exitCode = result.exitCode;
  } catch (error) {
    await writeError(error);
    process.exitCode = 1;
  }
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}

await program.parseAsync(process.argv);
