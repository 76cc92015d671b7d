/**
 * Basic usage example for the follow-audit library
 *
 * This example demonstrates:
 * 1. Normalizing two export documents of different layouts
 * 2. Creating an analyzer instance
 * 3. Querying non-followers, fans and mutuals
 * 4. Getting relationship statistics
 */

import { DuckDBFollowAnalyzer, parseExportDocument } from "../src/index.js";

const followingExport = {
  relationships_following: [
    { string_list_data: [{ value: "Alice", timestamp: 1700000000 }] },
    { string_list_data: [{ value: "@bob", timestamp: 1700000100 }] },
    { string_list_data: [{ value: "carol", timestamp: 1700000200 }] },
  ],
};

// Older exports are a bare array
const followersExport = [
  { string_list_data: [{ value: "bob" }] },
  { username: "Dave" },
];

async function main() {
  const following = parseExportDocument(followingExport);
  const followers = parseExportDocument(followersExport);

  console.log(`Following: ${following.usernames.size} (${following.shape})`);
  console.log(`Followers: ${followers.usernames.size} (${followers.shape})\n`);

  const analyzer = await DuckDBFollowAnalyzer.create({ verbose: true });

  try {
    await analyzer.ingestFollowing(following.usernames);
    await analyzer.ingestFollowers(followers.usernames);

    console.log("\nNot following you back:");
    for (const username of await analyzer.getNonFollowers()) {
      console.log(`  ${username}`);
    }

    console.log("\nYou don't follow back:");
    for (const username of await analyzer.getFans()) {
      console.log(`  ${username}`);
    }

    console.log("\nMutuals:");
    for (const username of await analyzer.getMutuals()) {
      console.log(`  ${username}`);
    }

    const stats = await analyzer.getStats();
    console.log("\nStatistics:");
    console.log(`  Non-followers: ${stats.nonFollowers}`);
    console.log(`  Fans: ${stats.fans}`);
    console.log(`  Mutuals: ${stats.mutuals}`);
  } finally {
    await analyzer.close();
  }
}

main().catch((error: unknown) => {
  console.error("Error:", error);
  process.exitCode = 1;
});
