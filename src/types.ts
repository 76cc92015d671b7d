/**
 * Type definitions for the follow-audit library
 */

/**
 * A JSON object as found inside an export document
 */
export type JsonObject = Record<string, unknown>;

/**
 * Keys probed, in order, when an export document is an object
 */
export const KNOWN_LIST_KEYS = [
  "relationships_following",
  "relationships_followers",
  "following",
  "followers",
] as const;

export type KnownListKey = (typeof KNOWN_LIST_KEYS)[number];

/**
 * Where the entries of an export document were found
 */
export type DocumentShape =
  | { kind: "top-level-list"; entries: unknown[] }
  | { kind: "keyed-list"; key: KnownListKey; entries: unknown[] }
  | { kind: "first-list-value"; key: string; entries: unknown[] }
  | { kind: "empty" };

export type DocumentShapeKind = DocumentShape["kind"];

/**
 * One strategy for pulling a raw username out of an entry
 */
export interface EntryExtractor {
  /** Name used in diagnostics and tests */
  name: string;
  /** Returns the raw (not yet normalized) username, or null if this strategy does not apply */
  extract(entry: JsonObject): string | null;
}

/**
 * Result of normalizing one export document
 */
export interface ParsedExportDocument {
  /** Canonical usernames found in the document */
  usernames: Set<string>;
  /** Which shape rule located the entries */
  shape: DocumentShapeKind;
  /** Number of elements in the entries array */
  totalEntries: number;
  /** Entries that contributed no username */
  skippedEntries: number;
}

/**
 * The two sides of a user's follow graph
 */
export type RelationshipSide = "following" | "followers";

/**
 * Configuration options for the FollowAnalyzer
 */
export interface FollowAnalyzerConfig {
  /** Path to the DuckDB database file. Defaults to ':memory:' */
  dbPath?: string;
  /** Log ingestion progress to the console (default: false) */
  verbose?: boolean;
}

/**
 * Counts over the ingested follow lists
 */
export interface FollowStats {
  /** Accounts the user follows */
  following: number;
  /** Accounts following the user */
  followers: number;
  /** Followed accounts that do not follow back */
  nonFollowers: number;
  /** Accounts on both lists */
  mutuals: number;
  /** Followers the user does not follow back */
  fans: number;
}

/**
 * Main interface for the follow analyzer
 */
export interface FollowAnalyzer {
  /**
   * Replaces the list of accounts the user follows
   * @param usernames - Canonical usernames
   */
  ingestFollowing(usernames: Iterable<string>): Promise<void>;

  /**
   * Replaces the list of accounts following the user
   * @param usernames - Canonical usernames
   */
  ingestFollowers(usernames: Iterable<string>): Promise<void>;

  /**
   * Accounts the user follows that do not follow back, sorted ascending
   */
  getNonFollowers(): Promise<string[]>;

  /**
   * Followers the user does not follow back, sorted ascending
   */
  getFans(): Promise<string[]>;

  /**
   * Accounts present on both lists, sorted ascending
   */
  getMutuals(): Promise<string[]>;

  /**
   * Check if the user follows an account
   * @param username - Raw or canonical username
   */
  isFollowing(username: string): Promise<boolean>;

  /**
   * Check if an account follows the user
   * @param username - Raw or canonical username
   */
  isFollowedBack(username: string): Promise<boolean>;

  /**
   * Get counts over both lists
   */
  getStats(): Promise<FollowStats>;

  /**
   * Close the database connection
   */
  close(): Promise<void>;
}

/**
 * Formats the output artifact can be written in
 */
export type ArtifactFormat = "text" | "csv";

/**
 * Everything the reporter needs for one run
 */
export interface AuditReport {
  followingCount: number;
  followersCount: number;
  nonFollowers: string[];
}

/**
 * Receives one line of console output
 */
export type LineWriter = (line: string) => void;
