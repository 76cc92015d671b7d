/**
 * Follow Audit Library
 *
 * Finds the accounts you follow that do not follow you back, from the
 * followers / following JSON files of a social network data export.
 * Set operations run on an in-memory DuckDB database.
 *
 * @packageDocumentation
 */

// Pipeline
export { runAudit } from "./audit.js";
export type { AuditResult } from "./audit.js";
export {
  DEFAULT_AUDIT_CONFIG,
  DEFAULT_FOLLOWERS_FILE,
  DEFAULT_FOLLOWING_FILE,
  DEFAULT_OUTPUT_FILE,
  resolveAuditConfig,
} from "./config.js";
export type { AuditConfig } from "./config.js";

// Normalization
export {
  detectDocumentShape,
  normalizeUsername,
  parseExportDocument,
  resolveEntryUsername,
  ENTRY_EXTRACTORS,
} from "./parser.js";
export { loadExportFile, readExportDocument } from "./loader.js";

// Set operations
export { DuckDBFollowAnalyzer } from "./analyzer.js";
export { findNonFollowers } from "./differ.js";

// Reporting
export {
  formatSummary,
  printReport,
  renderReport,
  serializeArtifact,
  writeArtifact,
} from "./reporter.js";

// Errors
export { InputReadError, OutputWriteError } from "./errors.js";

// Type definitions
export type {
  ArtifactFormat,
  AuditReport,
  DocumentShape,
  EntryExtractor,
  FollowAnalyzer,
  FollowAnalyzerConfig,
  FollowStats,
  ParsedExportDocument,
  RelationshipSide,
} from "./types.js";
