/**
 * Barrel export for all shared / cross-cutting modules.
 *
 * Consumers can import from `../shared/index.js` instead of reaching
 * into individual files.
 */

// ── Types ─────────────────────────────────────────────────────────────
export * from "./types/index.js";

// ── Canonical types & naming ──────────────────────────────────────────
export * from "./canonical-types.js";
export * from "./naming.js";

// ── Path helpers ──────────────────────────────────────────────────────
export { packageRoot, templatesDir, schemaDir, resolveDestination } from "./paths.js";

// ── YAML helpers ──────────────────────────────────────────────────────
export { parseYaml, stringifyYaml } from "./yaml.js";

// ── Version ───────────────────────────────────────────────────────────
export { TOOL_NAME, VERSION } from "./version.js";

// ── Logging ───────────────────────────────────────────────────────────
export { CliLogger, MemoryLogger, silentLogger, formatFields } from "./logger.js";
export type { Logger, LogFields, CliLoggerOptions } from "./logger.js";

// ── Errors ────────────────────────────────────────────────────────────
export {
  GeneratorError,
  type ErrorKind,
  isGeneratorError,
  formatCliError,
  exitCodeFor,
  isYAMLException,
  isNodeSystemError,
} from "./errors.js";
