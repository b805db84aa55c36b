export { buildJsonReport } from "./json-reporter.js";
export { renderMarkdownReport } from "./markdown-reporter.js";
export type { MarkdownRenderOptions } from "./markdown-reporter.js";
export type {
  PackageReport,
  ProvenanceReport,
  ReportEntry,
  ReportInput,
  RequirementsOutcome,
  StatusCounts,
  ToolInfo,
} from "./types.js";
