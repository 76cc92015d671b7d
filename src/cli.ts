/**
 * follow-audit command: reads followers.json and following.json from a
 * directory and writes not_following_back.txt next to them
 */

import { runAudit } from "./audit.js";
import { describeError } from "./errors.js";
import type { LineWriter } from "./types.js";

/**
 * Runs one audit and turns any failure into `Error: <message>` on the
 * error writer and a process exit code of 1
 *
 * @param directory - Directory holding the exports (default: current directory)
 * @param write - Report line sink (default: console.log)
 * @param writeError - Error line sink (default: console.error)
 */
export async function main(
  directory: string = process.cwd(),
  write: LineWriter = (line) => console.log(line),
  writeError: LineWriter = (line) => console.error(line),
): Promise<void> {
  try {
    await runAudit({ directory }, write);
  } catch (error) {
    writeError(`Error: ${describeError(error)}`);
    process.exitCode = 1;
  }
}
