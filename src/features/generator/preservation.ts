/**
 * Merge policy for writing into an existing tree: existing files win.
 *
 * A candidate whose path already exists under the destination is dropped
 * whole and counted as preserved. Nothing is diffed, merged or read; the
 * only filesystem access is an existence check per candidate.
 */
import { existsSync } from "node:fs";
import { join } from "node:path";
import type { GeneratedFile } from "../../shared/types/model.js";
import type { Logger } from "../../shared/logger.js";
import { silentLogger } from "../../shared/logger.js";

export interface PreservationResult {
  /** Candidates with no file at their path, unchanged and in input order. */
  safe: GeneratedFile[];
  /** Relative paths that already existed and were skipped. */
  preserved: string[];
  preservedCount: number;
}

export function preserveExistingFiles(
  destination: string,
  candidates: readonly GeneratedFile[],
  logger: Logger = silentLogger(),
): PreservationResult {
  const safe: GeneratedFile[] = [];
  const preserved: string[] = [];

  for (const file of candidates) {
    if (existsSync(join(destination, file.path))) {
      logger.warn("Skipping existing file", { path: file.path });
      preserved.push(file.path);
    } else {
      safe.push(file);
    }
  }

  if (preserved.length > 0) {
    logger.info(`Preserved ${preserved.length} existing file(s)`);
  }
  return { safe, preserved, preservedCount: preserved.length };
}
