/**
 * Run configuration for an audit
 */

import type { ArtifactFormat } from "./types.js";

export const DEFAULT_FOLLOWERS_FILE = "followers.json";
export const DEFAULT_FOLLOWING_FILE = "following.json";
export const DEFAULT_OUTPUT_FILE = "not_following_back.txt";

export interface AuditConfig {
  /** Directory the three files are resolved against */
  directory: string;
  followersFile: string;
  followingFile: string;
  outputFile: string;
  /** Artifact format (default: "text") */
  format: ArtifactFormat;
  /** Print how many entries of each export gave no username (default: false) */
  reportSkipped: boolean;
  /** Log ingestion progress (default: false) */
  verbose: boolean;
}

export const DEFAULT_AUDIT_CONFIG: Readonly<AuditConfig> = {
  directory: ".",
  followersFile: DEFAULT_FOLLOWERS_FILE,
  followingFile: DEFAULT_FOLLOWING_FILE,
  outputFile: DEFAULT_OUTPUT_FILE,
  format: "text",
  reportSkipped: false,
  verbose: false,
};

/**
 * Fills in defaults for any option not given
 * @param overrides - Options to change
 * @returns A complete configuration
 */
export function resolveAuditConfig(
  overrides: Partial<AuditConfig> = {},
): AuditConfig {
  return { ...DEFAULT_AUDIT_CONFIG, ...overrides };
}
