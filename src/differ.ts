import { DuckDBFollowAnalyzer } from "./analyzer.js";
import type { FollowAnalyzerConfig } from "./types.js";

/**
 * Computes `following − followers` on a short-lived in-memory analyzer
 *
 * @param following - Canonical usernames the user follows
 * @param followers - Canonical usernames following the user
 * @param config - Analyzer options (dbPath is ignored; the database is always in memory)
 * @returns Usernames in following but not in followers, without duplicates, sorted ascending
 */
export async function findNonFollowers(
  following: Iterable<string>,
  followers: Iterable<string>,
  config: Omit<FollowAnalyzerConfig, "dbPath"> = {},
): Promise<string[]> {
  const analyzer = await DuckDBFollowAnalyzer.create({
    ...config,
    dbPath: ":memory:",
  });

  try {
    await analyzer.ingestFollowing(following);
    await analyzer.ingestFollowers(followers);
    return await analyzer.getNonFollowers();
  } finally {
    await analyzer.close();
  }
}
