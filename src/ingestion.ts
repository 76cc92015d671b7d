/**
 * Data ingestion functions for follow lists
 */

import type { DuckDBConnection } from "@duckdb/node-api";
import type { RelationshipSide } from "./types.js";
import { RELATIONSHIP_TABLES } from "./database.js";
import { executeWithRetry } from "./utils.js";

const BATCH_SIZE = 1000;

/**
 * Replaces one side of the follow graph with the given usernames
 *
 * The existing rows for that side are deleted and the new list is inserted
 * in batches inside a single transaction. Duplicates are ignored by the
 * table's PRIMARY KEY. Usernames are expected to be canonical already.
 *
 * @param connection - Active DuckDB connection
 * @param side - Which list is being replaced
 * @param usernames - Canonical usernames
 * @param verbose - Log progress to the console
 */
export async function ingestUsernames(
  connection: DuckDBConnection,
  side: RelationshipSide,
  usernames: Iterable<string>,
  verbose: boolean = false,
): Promise<void> {
  const table = RELATIONSHIP_TABLES[side];
  const unique = Array.from(new Set(usernames));

  if (verbose) {
    console.log(`Ingesting ${unique.length} ${side} usernames...`);
  }

  await executeWithRetry(async () => {
    await connection.run("BEGIN TRANSACTION");

    try {
      await connection.run(`DELETE FROM ${table}`);

      const totalBatches = Math.ceil(unique.length / BATCH_SIZE);
      for (let i = 0; i < unique.length; i += BATCH_SIZE) {
        const batch = unique.slice(i, i + BATCH_SIZE);
        const placeholders = batch.map(() => "(?)").join(", ");

        await connection.run(
          `INSERT OR IGNORE INTO ${table} (username) VALUES ${placeholders}`,
          batch,
        );

        if (verbose) {
          const batchNumber = Math.floor(i / BATCH_SIZE) + 1;
          console.log(
            `Batch ${batchNumber}/${totalBatches} (${batch.length} usernames) written to ${table}`,
          );
        }
      }

      await connection.run("COMMIT");
    } catch (error) {
      await connection.run("ROLLBACK");
      throw error;
    }
  });

  if (verbose) {
    console.log(`Ingestion completed: ${unique.length} ${side} usernames`);
  }
}
