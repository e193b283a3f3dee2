/**
 * The contract every input-format adapter implements, plus the staged
 * file checks they share.
 *
 * Validation is staged and each stage fails with its own error:
 *
 *   1. path is non-empty and names an existing regular file
 *   2. extension is one the adapter supports
 *   3. content parses under the format's grammar           (adapter)
 *   4. content holds at least one entity candidate         (adapter)
 */
import { readFileSync, statSync } from "node:fs";
import { extname } from "node:path";
import type { DomainModel } from "../../shared/types/model.js";
import { GeneratorError } from "../../shared/errors.js";

/** A pluggable adapter from one input format to the canonical model. */
export interface DomainParser {
  /** Lower-case extensions including the dot, e.g. `.yaml`. */
  supportedExtensions(): readonly string[];
  /** Human-readable format name, e.g. `OpenAPI`. */
  formatName(): string;
  /** Run every validation stage; throws a stage-specific GeneratorError. */
  validate(filePath: string): void;
  /**
   * Validate, then convert. Either the whole model is returned or an
   * error is thrown; a partial model is never observable.
   */
  parse(filePath: string): DomainModel;
}

/**
 * Stages 1 and 2: the path names a readable regular file with a
 * supported extension. Returns the file's text.
 */
export function readInputFile(
  filePath: string,
  parser: Pick<DomainParser, "supportedExtensions" | "formatName">,
): string {
  const format = parser.formatName();

  if (!filePath) {
    throw new GeneratorError("validation", "file path cannot be empty");
  }

  let isFile: boolean;
  try {
    isFile = statSync(filePath).isFile();
  } catch (err) {
    throw new GeneratorError("filesystem", `${format} file does not exist: ${filePath}`, err);
  }
  if (!isFile) {
    throw new GeneratorError("validation", `${format} input is not a regular file: ${filePath}`);
  }

  const ext = extname(filePath).toLowerCase();
  const supported = parser.supportedExtensions();
  if (!supported.includes(ext)) {
    throw new GeneratorError(
      "validation",
      `unsupported file extension for ${format}: ${ext || "(none)"} (supported: ${supported.join(", ")})`,
    );
  }

  try {
    return readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new GeneratorError("filesystem", `cannot read ${format} file: ${filePath}`, err);
  }
}
