/**
 * Error taxonomy and CLI error-formatting helpers.
 *
 * Every error raised inside the pipeline is a {@link GeneratorError}
 * carrying its kind, a message naming the offending entity, template or
 * path, and the underlying cause when there is one. The CLI entry point
 * turns any thrown value into a one-line message via
 * {@link formatCliError}.
 */

/** Error categories, each with its own process exit code. */
export type ErrorKind =
  | "validation"
  | "parse"
  | "generation"
  | "filesystem"
  | "network"
  | "argument";

const EXIT_CODES: Record<ErrorKind, number> = {
  argument: 2,
  validation: 3,
  parse: 4,
  generation: 5,
  filesystem: 6,
  network: 7,
};

export class GeneratorError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "GeneratorError";
    this.kind = kind;
  }

  /** Process exit code for this error's kind. */
  get exitCode(): number {
    return EXIT_CODES[this.kind];
  }

  /** `kind: message (caused by: …)`, following the whole cause chain. */
  describe(): string {
    const base = `${this.kind}: ${this.message}`;
    if (this.cause === undefined) return base;
    const cause = this.cause instanceof GeneratorError
      ? this.cause.describe()
      : this.cause instanceof Error
        ? this.cause.message
        : String(this.cause);
    return `${base} (caused by: ${cause})`;
  }
}

export function isGeneratorError(err: unknown): err is GeneratorError {
  return err instanceof GeneratorError;
}

/**
 * Node.js system error shape (ENOENT, EACCES, EPERM, etc.).
 * Not all Error objects carry these, so we use a type guard.
 */
interface NodeSystemError extends Error {
  code: string;
  path?: string;
  syscall?: string;
}

export function isNodeSystemError(err: unknown): err is NodeSystemError {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

/**
 * js-yaml YAMLException shape.
 * We detect by `name` rather than importing the class to keep coupling low.
 */
interface YAMLExceptionLike extends Error {
  name: "YAMLException";
  reason?: string;
  mark?: { name?: string | null; line?: number; column?: number; snippet?: string };
}

export function isYAMLException(err: unknown): err is YAMLExceptionLike {
  return err instanceof Error && err.name === "YAMLException";
}

/** Describe a YAML exception with a 1-based location when js-yaml gives one. */
export function describeYamlError(err: YAMLExceptionLike): string {
  const reason = err.reason ?? "invalid YAML syntax";
  const mark = err.mark;
  if (mark && mark.line != null) {
    const file = mark.name ? `${mark.name} ` : "";
    // js-yaml lines are 0-based; display as 1-based
    const location = `line ${mark.line + 1}, column ${(mark.column ?? 0) + 1}`;
    return `Failed to parse YAML: ${reason} (${file}${location})`;
  }
  return `Failed to parse YAML: ${reason}`;
}

/**
 * Format an error into a user-friendly CLI message.
 *
 * Categories handled:
 * - GeneratorError     → `kind: message (caused by: …)`
 * - YAML parse errors  → clean "Failed to parse YAML" with location
 * - ENOENT             → "File not found" with path
 * - EACCES / EPERM     → "Permission denied" with path
 * - Everything else    → the error message without a stack trace
 */
export function formatCliError(err: unknown): string {
  if (isGeneratorError(err)) {
    return err.describe();
  }

  if (isYAMLException(err)) {
    const msg = describeYamlError(err);
    return err.mark?.snippet ? `${msg}\n${err.mark.snippet}` : msg;
  }

  if (isNodeSystemError(err)) {
    const filePath = err.path ? ` "${err.path}"` : "";
    switch (err.code) {
      case "ENOENT":
        return `File not found:${filePath}. Check that the path exists.`;
      case "EACCES":
      case "EPERM":
        return `Permission denied:${filePath}. Check file permissions.`;
      case "EISDIR":
        return `Expected a file but found a directory:${filePath}.`;
      default:
        return `System error (${err.code}):${filePath}: ${err.message}`;
    }
  }

  if (err instanceof Error) {
    return err.message;
  }

  return String(err);
}

/** Exit code for any thrown value (1 for anything that is not a GeneratorError). */
export function exitCodeFor(err: unknown): number {
  return isGeneratorError(err) ? err.exitCode : 1;
}
