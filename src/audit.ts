/**
 * One audit run: load both exports, diff them, report
 */

import { basename, resolve } from "path";
import type { AuditConfig } from "./config.js";
import { resolveAuditConfig } from "./config.js";
import type { LineWriter, ParsedExportDocument } from "./types.js";
import { loadExportFile } from "./loader.js";
import { findNonFollowers } from "./differ.js";
import { printReport, writeArtifact } from "./reporter.js";

export interface AuditResult {
  following: ParsedExportDocument;
  followers: ParsedExportDocument;
  /** Followed accounts that do not follow back, sorted ascending */
  nonFollowers: string[];
  /** Absolute path of the artifact that was written */
  outputPath: string;
}

/**
 * Runs the full pipeline
 *
 * Followers are loaded before following; either failing aborts the run
 * before anything is printed or written. The console report is printed
 * before the artifact is written.
 *
 * @param overrides - Configuration changes from DEFAULT_AUDIT_CONFIG
 * @param write - Line sink for the report (default: console.log)
 * @returns What was computed and where it was saved
 * @throws InputReadError if an export cannot be loaded
 * @throws OutputWriteError if the artifact cannot be written
 */
export async function runAudit(
  overrides: Partial<AuditConfig> = {},
  write: LineWriter = (line) => console.log(line),
): Promise<AuditResult> {
  const config = resolveAuditConfig(overrides);
  const followersPath = resolve(config.directory, config.followersFile);
  const followingPath = resolve(config.directory, config.followingFile);
  const outputPath = resolve(config.directory, config.outputFile);

  const followers = loadExportFile(followersPath);
  const following = loadExportFile(followingPath);

  const nonFollowers = await findNonFollowers(
    following.usernames,
    followers.usernames,
    { verbose: config.verbose },
  );

  printReport(
    {
      followingCount: following.usernames.size,
      followersCount: followers.usernames.size,
      nonFollowers,
    },
    write,
  );

  if (config.reportSkipped) {
    write("");
    write(
      `Skipped ${following.skippedEntries} of ${following.totalEntries} entries in ${config.followingFile}`,
    );
    write(
      `Skipped ${followers.skippedEntries} of ${followers.totalEntries} entries in ${config.followersFile}`,
    );
  }

  writeArtifact(outputPath, nonFollowers, config.format);
  write("");
  write(`Saved → ${basename(outputPath)}`);

  return { following, followers, nonFollowers, outputPath };
}
