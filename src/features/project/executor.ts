/**
 * File writer: the only component that touches the destination tree.
 *
 * In write mode every file is written under the destination, creating
 * intermediate directories; the abort signal is checked before each file.
 * In dry-run mode nothing is written and the batch is listed, grouped by
 * directory, with a short content preview when the logger is verbose.
 */
import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import type { GeneratedFile } from "../../shared/types/model.js";
import type { Logger } from "../../shared/logger.js";
import { GeneratorError } from "../../shared/errors.js";

const PREVIEW_CHARS = 500;
const PREVIEW_LINES = 20;

export interface ExecuteOptions {
  dryRun?: boolean;
  signal?: AbortSignal;
}

/** What an execution wrote, or in dry-run mode would have written. */
export interface ExecuteResult {
  /** Relative paths, in batch order. */
  files: string[];
  dryRun: boolean;
}

/** Group relative paths by their directory; top-level files go under `.`. */
export function groupByDirectory(files: readonly GeneratedFile[]): Map<string, GeneratedFile[]> {
  const groups = new Map<string, GeneratedFile[]>();
  for (const file of files) {
    const dir = dirname(file.path);
    const group = groups.get(dir);
    if (group) group.push(file);
    else groups.set(dir, [file]);
  }
  return groups;
}

/** The first lines of `content`, capped in characters and lines. */
export function previewContent(content: string): string[] {
  const lines = content.slice(0, PREVIEW_CHARS).split("\n");
  if (lines.length > PREVIEW_LINES) {
    return [...lines.slice(0, PREVIEW_LINES), "... (truncated)"];
  }
  return content.length > PREVIEW_CHARS ? [...lines, "... (truncated)"] : lines;
}

export class FileExecutor {
  constructor(private readonly logger: Logger) {}

  execute(files: readonly GeneratedFile[], destination: string, options: ExecuteOptions = {}): ExecuteResult {
    const dryRun = options.dryRun ?? false;
    if (files.length === 0) {
      this.logger.info("No files to generate");
      return { files: [], dryRun };
    }
    return dryRun ? this.preview(files, destination) : this.write(files, destination, options.signal);
  }

  private write(files: readonly GeneratedFile[], destination: string, signal?: AbortSignal): ExecuteResult {
    this.logger.info("Generating files", { count: files.length, destination });
    const written: string[] = [];

    files.forEach((file, i) => {
      if (signal?.aborted) {
        throw new GeneratorError(
          "generation",
          `file generation was cancelled before ${file.path}`,
          signal.reason,
        );
      }
      const fullPath = join(destination, file.path);
      this.logger.debug("Creating file", { progress: `${i + 1}/${files.length}`, path: fullPath });
      try {
        mkdirSync(dirname(fullPath), { recursive: true });
        writeFileSync(fullPath, file.content, "utf-8");
      } catch (err) {
        throw new GeneratorError("filesystem", `failed to write file ${fullPath}`, err);
      }
      written.push(file.path);
      this.logger.info(`✓ Created: ${file.path}`);
    });

    this.logger.info("Successfully generated files", { count: written.length });
    return { files: written, dryRun: false };
  }

  private preview(files: readonly GeneratedFile[], destination: string): ExecuteResult {
    this.logger.info("DRY RUN: no files will be created", { destination, count: files.length });
    const groups = groupByDirectory(files);

    for (const [dir, group] of groups) {
      this.logger.info(`Directory: ${dir}`);
      for (const file of group) {
        this.logger.info(`  ✓ ${file.path}`);
        if (this.logger.isVerbose()) {
          this.logger.debug("Content preview", { file: file.path, size: file.content.length });
          for (const line of previewContent(file.content)) {
            this.logger.debug(`    ${line}`);
          }
        }
      }
    }

    this.logger.info("Dry run summary", { files: files.length, directories: groups.size });
    if (!this.logger.isVerbose()) {
      this.logger.info("Use --verbose to see file content previews");
    }
    return { files: files.map((f) => f.path), dryRun: true };
  }
}
