/**
 * Finalization: swap the provisional header of a written artifact for the
 * final one.
 *
 * The new header goes into a replacement resource first, followed by every
 * line of the original that is not a header line, copied unchanged. The
 * replacement then takes the original's place in one step. Running this
 * twice with the same header leaves the artifact as it was.
 */

import { isHeaderLine } from "../header/format.js";
import type { OutputManager } from "../output/manager.js";

/**
 * @returns the number of data lines carried over
 */
export function finalizeArtifact<A>(
  manager: OutputManager<A>,
  artifact: A,
  header: string
): number {
  const replacement = manager.openReplacement(artifact);

  try {
    replacement.write(header);
    let rows = 0;
    for (const line of manager.readLines(artifact)) {
      if (!isHeaderLine(line)) {
        replacement.write(line);
        rows++;
      }
    }
    replacement.commit();
    return rows;
  } catch (err) {
    replacement.abort();
    throw err;
  }
}
