/**
 * Main FollowAnalyzer class - the primary API for relationship queries
 */

import type { DuckDBInstance, DuckDBConnection } from "@duckdb/node-api";
import type {
  FollowAnalyzerConfig,
  FollowStats,
  FollowAnalyzer as IFollowAnalyzer,
} from "./types.js";
import {
  initializeDatabase,
  setupSchema,
  getTableStats,
  getNonFollowers,
  getFans,
  getMutuals,
  usernameExists,
} from "./database.js";
import { ingestUsernames } from "./ingestion.js";
import { normalizeUsername } from "./parser.js";
import { executeWithRetry } from "./utils.js";

/**
 * DuckDB-based analyzer over a user's following and followers lists
 *
 * Both lists live in their own table; every query is a set operation
 * between them.
 */
export class DuckDBFollowAnalyzer implements IFollowAnalyzer {
  private instance: DuckDBInstance | null = null;
  private connection: DuckDBConnection;
  private verbose: boolean;
  private closed: boolean = false;

  /**
   * Private constructor - use static create() or connect() methods instead
   */
  private constructor(
    instance: DuckDBInstance | null,
    connection: DuckDBConnection,
    verbose: boolean,
  ) {
    this.instance = instance;
    this.connection = connection;
    this.verbose = verbose;
  }

  /**
   * Creates a new analyzer backed by its own database
   *
   * @param config - Configuration options
   * @returns Promise resolving to a new analyzer instance
   */
  static async create(
    config: FollowAnalyzerConfig = {},
  ): Promise<DuckDBFollowAnalyzer> {
    const { dbPath = ":memory:", verbose = false } = config;

    const instance = await initializeDatabase(dbPath);
    const connection = await instance.connect();

    const analyzer = new DuckDBFollowAnalyzer(instance, connection, verbose);
    await setupSchema(connection);

    return analyzer;
  }

  /**
   * Creates a new analyzer on an existing DuckDB connection
   *
   * The caller keeps ownership of the connection; close() will not close it.
   *
   * @param connection - Existing DuckDB connection
   * @param verbose - Log ingestion progress (default: false)
   * @returns Promise resolving to a new analyzer instance
   */
  static async connect(
    connection: DuckDBConnection,
    verbose: boolean = false,
  ): Promise<DuckDBFollowAnalyzer> {
    const analyzer = new DuckDBFollowAnalyzer(null, connection, verbose);
    await setupSchema(connection);
    return analyzer;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("Analyzer has been closed");
    }
  }

  /**
   * Replaces the list of accounts the user follows
   *
   * @param usernames - Canonical usernames
   * @throws Error if the analyzer is closed
   */
  async ingestFollowing(usernames: Iterable<string>): Promise<void> {
    this.assertOpen();
    await ingestUsernames(
      this.connection,
      "following",
      usernames,
      this.verbose,
    );
  }

  /**
   * Replaces the list of accounts following the user
   *
   * @param usernames - Canonical usernames
   * @throws Error if the analyzer is closed
   */
  async ingestFollowers(usernames: Iterable<string>): Promise<void> {
    this.assertOpen();
    await ingestUsernames(
      this.connection,
      "followers",
      usernames,
      this.verbose,
    );
  }

  /**
   * Gets the accounts the user follows that do not follow back
   *
   * @returns Promise resolving to usernames sorted ascending
   *
   * @example
   * ```typescript
   * await analyzer.ingestFollowing(["alice", "bob"]);
   * await analyzer.ingestFollowers(["bob"]);
   * await analyzer.getNonFollowers(); // ["alice"]
   * ```
   */
  async getNonFollowers(): Promise<string[]> {
    this.assertOpen();
    return getNonFollowers(this.connection);
  }

  /**
   * Gets the followers the user does not follow back
   */
  async getFans(): Promise<string[]> {
    this.assertOpen();
    return getFans(this.connection);
  }

  /**
   * Gets the accounts present on both lists
   */
  async getMutuals(): Promise<string[]> {
    this.assertOpen();
    return getMutuals(this.connection);
  }

  /**
   * Checks if the user follows an account
   *
   * @param username - Raw or canonical username; it is normalized first
   */
  async isFollowing(username: string): Promise<boolean> {
    this.assertOpen();
    return usernameExists(
      this.connection,
      "following",
      normalizeUsername(username),
    );
  }

  /**
   * Checks if an account follows the user
   *
   * @param username - Raw or canonical username; it is normalized first
   */
  async isFollowedBack(username: string): Promise<boolean> {
    this.assertOpen();
    return usernameExists(
      this.connection,
      "followers",
      normalizeUsername(username),
    );
  }

  /**
   * Gets counts over both lists
   *
   * @example
   * ```typescript
   * const stats = await analyzer.getStats();
   * console.log(`Not following back: ${stats.nonFollowers}`);
   * ```
   */
  async getStats(): Promise<FollowStats> {
    this.assertOpen();
    return getTableStats(this.connection);
  }

  /**
   * Closes the database connection
   *
   * Only a connection opened by create() is checkpointed and closed, so an
   * on-disk database leaves no write-ahead log behind. After calling this
   * method, the analyzer cannot be used anymore.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    if (this.instance) {
      await executeWithRetry(async () => {
        await this.connection.run("CHECKPOINT");
      });
      this.connection.closeSync();
      this.instance = null;
    }

    this.closed = true;
  }

  /**
   * Checks if the analyzer has been closed
   */
  isClosed(): boolean {
    return this.closed;
  }
}
