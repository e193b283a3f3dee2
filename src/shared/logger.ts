/**
 * Console-backed, leveled logger.
 *
 * The pipeline only depends on {@link Logger}: accept a message and
 * optional key/value annotations, never block. {@link CliLogger} is the
 * implementation the CLI wires in; `--verbose` turns on debug output,
 * timestamps and the section banner.
 */

/** Key/value annotations appended to a log line as ` key=value`. */
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  isVerbose(): boolean;
}

/** Render annotations as ` key=value` pairs, in insertion order. */
export function formatFields(fields?: LogFields): string {
  if (!fields) return "";
  let out = "";
  for (const [key, value] of Object.entries(fields)) {
    const rendered = Array.isArray(value)
      ? `[${value.map(String).join(" ")}]`
      : String(value);
    out += ` ${key}=${rendered}`;
  }
  return out;
}

/** Options for {@link CliLogger}. */
export interface CliLoggerOptions {
  verbose?: boolean;
  /** Prefix every line with an ISO timestamp. Defaults to `verbose`. */
  timestamps?: boolean;
  /** Optional tag printed after the level, e.g. `CLI`. */
  prefix?: string;
}

export class CliLogger implements Logger {
  private readonly verbose: boolean;
  private readonly timestamps: boolean;
  private readonly prefix?: string;

  constructor(options: CliLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.timestamps = options.timestamps ?? this.verbose;
    this.prefix = options.prefix;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  debug(msg: string, fields?: LogFields): void {
    if (!this.verbose) return;
    console.log(this.line("DEBUG", msg, fields));
  }

  info(msg: string, fields?: LogFields): void {
    console.log(this.line("INFO", msg, fields));
  }

  warn(msg: string, fields?: LogFields): void {
    console.error(this.line("WARN", msg, fields));
  }

  error(msg: string, fields?: LogFields): void {
    console.error(this.line("ERROR", msg, fields));
  }

  /** Banner for a major phase; verbose only. */
  section(title: string): void {
    if (!this.verbose) return;
    const rule = "=".repeat(60);
    console.log(`\n${rule}\n${title.toUpperCase()}\n${rule}`);
  }

  private line(level: string, msg: string, fields?: LogFields): string {
    const ts = this.timestamps ? `${new Date().toISOString()} ` : "";
    const tag = this.prefix ? ` [${this.prefix}]` : "";
    return `${ts}[${level}]${tag} ${msg}${formatFields(fields)}`;
  }
}

/** A logger that drops everything; for library callers and tests. */
export function silentLogger(): Logger {
  const noop = (): void => {};
  return { debug: noop, info: noop, warn: noop, error: noop, isVerbose: () => false };
}

/** A logger that records lines in memory; for tests. */
export class MemoryLogger implements Logger {
  readonly lines: string[] = [];

  constructor(private readonly verbose = false) {}

  isVerbose(): boolean {
    return this.verbose;
  }

  debug(msg: string, fields?: LogFields): void {
    if (this.verbose) this.lines.push(`[DEBUG] ${msg}${formatFields(fields)}`);
  }

  info(msg: string, fields?: LogFields): void {
    this.lines.push(`[INFO] ${msg}${formatFields(fields)}`);
  }

  warn(msg: string, fields?: LogFields): void {
    this.lines.push(`[WARN] ${msg}${formatFields(fields)}`);
  }

  error(msg: string, fields?: LogFields): void {
    this.lines.push(`[ERROR] ${msg}${formatFields(fields)}`);
  }
}
