/**
 * Console report and output artifact for an audit run
 */

import { writeFileSync } from "fs";
import type { ArtifactFormat, AuditReport, LineWriter } from "./types.js";
import { OutputWriteError, describeError } from "./errors.js";

const CSV_HEADER = "username";
const CSV_LINE_BREAK = "\r\n";

/**
 * Summary lines for a run
 * @param report - Counts and non-followers
 */
export function formatSummary(report: AuditReport): string[] {
  return [
    `Following: ${report.followingCount}`,
    `Followers: ${report.followersCount}`,
    `Not following you back: ${report.nonFollowers.length}`,
  ];
}

/**
 * Full console report: summary, a blank line, then one username per line
 * @param report - Counts and non-followers
 */
export function renderReport(report: AuditReport): string[] {
  return [...formatSummary(report), "", ...report.nonFollowers];
}

/**
 * Writes the console report line by line
 * @param report - Counts and non-followers
 * @param write - Line sink (default: console.log)
 */
export function printReport(
  report: AuditReport,
  write: LineWriter = (line) => console.log(line),
): void {
  for (const line of renderReport(report)) {
    write(line);
  }
}

function escapeCsvField(field: string): string {
  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

/**
 * Serializes usernames for the output artifact
 *
 * "text" is the usernames joined by newlines with no header and no trailing
 * newline. "csv" adds a `username` header row and separates rows with CRLF.
 *
 * @param usernames - Usernames in output order
 * @param format - Artifact format (default: "text")
 */
export function serializeArtifact(
  usernames: readonly string[],
  format: ArtifactFormat = "text",
): string {
  if (format === "csv") {
    const rows = [CSV_HEADER, ...usernames.map(escapeCsvField)];
    return rows.join(CSV_LINE_BREAK) + CSV_LINE_BREAK;
  }
  return usernames.join("\n");
}

/**
 * Creates or overwrites the output artifact
 *
 * @param path - Destination file
 * @param usernames - Usernames in output order
 * @param format - Artifact format (default: "text")
 * @throws OutputWriteError if the file cannot be written
 */
export function writeArtifact(
  path: string,
  usernames: readonly string[],
  format: ArtifactFormat = "text",
): void {
  try {
    writeFileSync(path, serializeArtifact(usernames, format), "utf-8");
  } catch (error) {
    throw new OutputWriteError(
      path,
      `Could not write ${path}: ${describeError(error)}`,
      error,
    );
  }
}
