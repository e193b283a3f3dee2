/**
 * Path and name checks run before anything is parsed or written.
 *
 * Each check throws a {@link GeneratorError}: `validation` for inputs
 * that are the wrong shape, `filesystem` for paths that cannot be reached.
 */
import { accessSync, constants, statSync, type Stats } from "node:fs";
import { dirname, resolve } from "node:path";
import { GeneratorError } from "../../shared/errors.js";

/** Lower-case letters, digits and hyphens; starts with a letter, ends with a letter or digit. */
const PROJECT_NAME = /^[a-z][a-z0-9-]*[a-z0-9]$|^[a-z]$/;

/** Device names Windows refuses as file or directory names. */
const RESERVED_NAMES = new Set([
  "con", "prn", "aux", "nul",
  ...Array.from({ length: 9 }, (_, i) => `com${i + 1}`),
  ...Array.from({ length: 9 }, (_, i) => `lpt${i + 1}`),
]);

export function validateProjectName(name: string): void {
  if (!name) {
    throw new GeneratorError("validation", "project name cannot be empty");
  }
  if (!PROJECT_NAME.test(name)) {
    throw new GeneratorError(
      "validation",
      `invalid project name "${name}": use lowercase letters, numbers and hyphens, starting with a letter`,
    );
  }
  if (RESERVED_NAMES.has(name)) {
    throw new GeneratorError("validation", `project name "${name}" is reserved and cannot be used`);
  }
}

/** The input exists, is a regular file and can be read. */
export function validateInputFile(filePath: string): void {
  if (!filePath) {
    throw new GeneratorError("validation", "input file path cannot be empty");
  }
  const stats = statOrUndefined(filePath);
  if (!stats) {
    throw new GeneratorError("filesystem", `input file does not exist: ${filePath}`);
  }
  if (stats.isDirectory()) {
    throw new GeneratorError("validation", `input path is a directory, not a file: ${filePath}`);
  }
  try {
    accessSync(filePath, constants.R_OK);
  } catch (err) {
    throw new GeneratorError("filesystem", `cannot read input file: ${filePath}`, err);
  }
}

/**
 * An existing destination must be a writable directory; a missing one
 * needs a writable parent directory. An empty path means the current
 * directory and always passes.
 */
export function validateDestination(destination: string): void {
  if (!destination) return;
  const abs = resolve(destination);

  const stats = statOrUndefined(abs);
  if (stats) {
    if (!stats.isDirectory()) {
      throw new GeneratorError("validation", `destination exists but is not a directory: ${abs}`);
    }
    assertWritable(abs, "destination directory is not writable");
    return;
  }

  const parent = dirname(abs);
  const parentStats = statOrUndefined(parent);
  if (!parentStats) {
    throw new GeneratorError("filesystem", `destination parent directory does not exist: ${parent}`);
  }
  if (!parentStats.isDirectory()) {
    throw new GeneratorError("validation", `destination parent is not a directory: ${parent}`);
  }
  assertWritable(parent, "destination parent directory is not writable");
}

function statOrUndefined(path: string): Stats | undefined {
  try {
    return statSync(path);
  } catch {
    return undefined;
  }
}

function assertWritable(dir: string, message: string): void {
  try {
    accessSync(dir, constants.W_OK);
  } catch (err) {
    throw new GeneratorError("filesystem", `${message}: ${dir}`, err);
  }
}
