import type { TrustedPublisher } from "../provenance/types.js";
import type { PackageReport, ProvenanceReport } from "./types.js";
import { renderAsciiBox, renderAsciiTable, truncateText } from "./report-utils.js";

export interface MarkdownRenderOptions {
  readonly showSummary?: boolean;
  /** Include each result's details map. */
  readonly showDetails?: boolean;
  readonly repositoryWidth?: number;
}

export function renderMarkdownReport(
  report: ProvenanceReport,
  options: MarkdownRenderOptions = {},
): string {
  const showSummary = options.showSummary ?? true;
  const showDetails = options.showDetails ?? false;
  const repositoryWidth = options.repositoryWidth ?? 48;
  const lines: string[] = [];

  if (showSummary) {
    lines.push(renderHeaderBlock(report));
    lines.push("");
  }

  if (report.packages.length === 0) {
    lines.push("No packages verified.");
    return lines.join("\n");
  }

  lines.push(
    renderAsciiTable(
      report.packages.map((pkg) => [
        pkg.ecosystem,
        pkg.name,
        pkg.version,
        pkg.status,
        truncateText(pkg.trusted_publisher?.repository || "-", repositoryWidth),
      ]),
      ["Ecosystem", "Package", "Version", "Status", "Publisher"],
    ),
  );

  for (const pkg of report.packages) {
    lines.push("");
    lines.push(...renderPackageSection(pkg, showDetails));
  }

  return lines.join("\n");
}

function renderHeaderBlock(report: ProvenanceReport): string {
  const counts = report.summary.counts;
  return renderAsciiBox([
    "MCP Provenance Report",
    `Packages: ${counts.total}`,
    `Verified: ${counts.verified}  Attestations: ${counts.attestations}  Signatures: ${counts.signatures}`,
    `None: ${counts.none}  Unknown: ${counts.unknown}  Error: ${counts.error}`,
  ]);
}

function renderPackageSection(
  pkg: PackageReport,
  showDetails: boolean,
): string[] {
  const lines = [`### ${pkg.ecosystem}:${pkg.name}@${pkg.version}`, ""];
  if (pkg.source) {
    lines.push(`Spec: ${pkg.source}`);
  }
  lines.push(`Status: ${pkg.status}`);
  lines.push(...statusLines(pkg));
  if (pkg.repository_uri) {
    lines.push(`Repository: ${pkg.repository_uri}`);
  }

  for (const check of pkg.expectations) {
    lines.push(`${check.outcome === "match" ? "[ok]" : "[mismatch]"} ${check.message}`);
  }
  if (pkg.requirements && !pkg.requirements.ok && pkg.requirements.message) {
    lines.push(`[fail] ${pkg.requirements.message}`);
  }

  const detailEntries = Object.entries(pkg.details);
  if (showDetails && detailEntries.length > 0) {
    lines.push("");
    lines.push("Details:");
    for (const [key, value] of detailEntries) {
      lines.push(`  ${key}: ${formatDetail(value)}`);
    }
  }
  return lines;
}

function statusLines(pkg: PackageReport): string[] {
  switch (pkg.status) {
    case "VERIFIED":
      return [
        "Provenance verified cryptographically",
        ...verifiedCountLines(pkg),
        ...publisherLines(pkg.trusted_publisher),
      ];
    case "ATTESTATIONS":
      return [
        pkg.attestation_count > 0
          ? `Package has ${pkg.attestation_count} attestation(s) that could not be verified`
          : "Package has attestations that could not be verified",
        ...publisherLines(pkg.trusted_publisher),
        ...(pkg.error_message ? [`  Reason: ${pkg.error_message}`] : []),
      ];
    case "SIGNATURES":
      return ["Package has registry signatures (legacy provenance format)"];
    case "TRUSTED_PUBLISHER":
      return [
        "Package uses a trusted publisher",
        ...publisherLines(pkg.trusted_publisher),
      ];
    case "NONE":
      return ["No provenance information available"];
    case "ERROR":
      return [`Error: ${pkg.error_message ?? "verification failed"}`];
    default:
      return [`Status unknown: ${pkg.error_message ?? "no details"}`];
  }
}

/** Files verified per-file (PyPI) are listed in details; others count as a whole. */
function verifiedCountLines(pkg: PackageReport): string[] {
  const verifiedFiles = pkg.details.verified_files;
  const verified = Array.isArray(verifiedFiles)
    ? verifiedFiles.length
    : pkg.attestation_count;
  if (verified === 0) {
    return [];
  }
  return verified < pkg.attestation_count
    ? [`  Attestations: ${verified} of ${pkg.attestation_count} verified`]
    : [`  Attestations: ${verified} verified`];
}

function publisherLines(publisher: TrustedPublisher | undefined): string[] {
  if (!publisher) {
    return [];
  }
  const lines = [
    `  Publisher: ${publisher.kind} (${publisher.repository || "unknown repository"})`,
  ];
  if (publisher.workflow) {
    lines.push(`  Workflow: ${publisher.workflow}`);
  }
  return lines;
}

function formatDetail(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  return JSON.stringify(value);
}
