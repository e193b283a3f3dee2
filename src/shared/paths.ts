/**
 * Path resolution utilities.
 *
 * Package asset paths (`packageRoot`, `templatesDir`, `schemaDir`)
 * resolve relative to this module, so the bundled Handlebars templates
 * and JSON schemas are found regardless of the user's working directory.
 * Destination paths are the caller's business and resolve from
 * `process.cwd()`.
 */
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Resolve the package installation root.
 *
 * When running from source (`tsx src/cli.ts`) this module lives in
 * `src/shared/`; from the compiled output in `dist/shared/`. Either way
 * the root is two levels up.
 */
export function packageRoot(): string {
  return resolve(dirname(fileURLToPath(import.meta.url)), "../..");
}

/**
 * Absolute path to the Handlebars template library.
 *
 * `SPECFORGE_TEMPLATES_DIR` overrides the bundled `tools/specforge/templates/`.
 */
export function templatesDir(): string {
  const override = process.env.SPECFORGE_TEMPLATES_DIR;
  if (override) return resolve(override);
  return join(packageRoot(), "tools", "specforge", "templates");
}

/** Absolute path to `tools/specforge/schema/`. */
export function schemaDir(): string {
  return join(packageRoot(), "tools", "specforge", "schema");
}

/** Resolve a destination directory; empty means the current directory. */
export function resolveDestination(destination?: string): string {
  return resolve(destination && destination.length > 0 ? destination : ".");
}
