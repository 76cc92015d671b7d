/**
 * Database initialization and schema management for DuckDB
 */

import { DuckDBInstance, DuckDBConnection } from "@duckdb/node-api";
import type { DuckDBValue } from "@duckdb/node-api";
import type { FollowStats, RelationshipSide } from "./types.js";

/**
 * Table holding each side of the follow graph. One canonical username per row;
 * the PRIMARY KEY collapses duplicates on insert.
 */
export const RELATIONSHIP_TABLES: Record<RelationshipSide, string> = {
  following: "fa_following",
  followers: "fa_followers",
};

const CREATE_TABLES = `
CREATE TABLE IF NOT EXISTS fa_following (
    username VARCHAR NOT NULL PRIMARY KEY
);
CREATE TABLE IF NOT EXISTS fa_followers (
    username VARCHAR NOT NULL PRIMARY KEY
);
`;

/**
 * Initializes a DuckDB database instance
 * @param dbPath - Path to the database file, or ':memory:' for in-memory database
 * @returns Promise resolving to the DuckDB instance
 */
export async function initializeDatabase(
  dbPath: string = ":memory:",
): Promise<DuckDBInstance> {
  const instance = await DuckDBInstance.create(dbPath);
  return instance;
}

/**
 * Sets up the database schema
 * @param connection - Active DuckDB connection
 */
export async function setupSchema(connection: DuckDBConnection): Promise<void> {
  await connection.run(`
    BEGIN TRANSACTION;
    ${CREATE_TABLES}
    COMMIT;
  `);
}

function toCount(value: DuckDBValue | undefined): number {
  return typeof value === "bigint" || typeof value === "number"
    ? Number(value)
    : 0;
}

/**
 * Reads the first column of every row as a string
 */
async function readUsernames(
  connection: DuckDBConnection,
  sql: string,
  params: string[] = [],
): Promise<string[]> {
  const reader = await connection.runAndReadAll(sql, params);
  const usernames: string[] = [];
  for (const row of reader.getRows()) {
    const value = row[0];
    if (typeof value === "string") {
      usernames.push(value);
    }
  }
  return usernames;
}

/**
 * Gets accounts the user follows that do not follow back
 * @param connection - Active DuckDB connection
 * @returns Promise resolving to usernames sorted ascending
 */
export async function getNonFollowers(
  connection: DuckDBConnection,
): Promise<string[]> {
  return readUsernames(
    connection,
    `
    SELECT username FROM (
      SELECT username FROM fa_following
      EXCEPT
      SELECT username FROM fa_followers
    )
    ORDER BY username
    `,
  );
}

/**
 * Gets followers the user does not follow back
 * @param connection - Active DuckDB connection
 * @returns Promise resolving to usernames sorted ascending
 */
export async function getFans(
  connection: DuckDBConnection,
): Promise<string[]> {
  return readUsernames(
    connection,
    `
    SELECT username FROM (
      SELECT username FROM fa_followers
      EXCEPT
      SELECT username FROM fa_following
    )
    ORDER BY username
    `,
  );
}

/**
 * Gets accounts present on both lists
 * @param connection - Active DuckDB connection
 * @returns Promise resolving to usernames sorted ascending
 */
export async function getMutuals(
  connection: DuckDBConnection,
): Promise<string[]> {
  return readUsernames(
    connection,
    `
    SELECT username FROM (
      SELECT username FROM fa_following
      INTERSECT
      SELECT username FROM fa_followers
    )
    ORDER BY username
    `,
  );
}

/**
 * Checks if a canonical username is present on one side
 * @param connection - Active DuckDB connection
 * @param side - Which list to look in
 * @param username - Canonical username
 */
export async function usernameExists(
  connection: DuckDBConnection,
  side: RelationshipSide,
  username: string,
): Promise<boolean> {
  const rows = await readUsernames(
    connection,
    `SELECT username FROM ${RELATIONSHIP_TABLES[side]} WHERE username = ? LIMIT 1`,
    [username],
  );
  return rows.length > 0;
}

/**
 * Gets counts over both tables
 * @param connection - Active DuckDB connection
 * @returns Object containing table statistics
 */
export async function getTableStats(
  connection: DuckDBConnection,
): Promise<FollowStats> {
  const reader = await connection.runAndReadAll(`
    SELECT
      (SELECT COUNT(*) FROM fa_following) AS following,
      (SELECT COUNT(*) FROM fa_followers) AS followers,
      (SELECT COUNT(*) FROM fa_following f
        WHERE NOT EXISTS (SELECT 1 FROM fa_followers r WHERE r.username = f.username)) AS non_followers,
      (SELECT COUNT(*) FROM fa_following f
        WHERE EXISTS (SELECT 1 FROM fa_followers r WHERE r.username = f.username)) AS mutuals,
      (SELECT COUNT(*) FROM fa_followers r
        WHERE NOT EXISTS (SELECT 1 FROM fa_following f WHERE f.username = r.username)) AS fans
  `);

  const rows = reader.getRows();
  const row = rows.length > 0 ? rows[0] : [];

  return {
    following: toCount(row[0]),
    followers: toCount(row[1]),
    nonFollowers: toCount(row[2]),
    mutuals: toCount(row[3]),
    fans: toCount(row[4]),
  };
}
