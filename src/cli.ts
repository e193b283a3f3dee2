#!/usr/bin/env node
import { Command } from "commander";
import { registerGenerate } from "./features/generator/commands/generate.js";
import { registerNew } from "./features/project/commands/new.js";
import { registerFormats } from "./features/parsers/commands/formats.js";
import { registerVersion } from "./features/project/commands/version.js";
import { TOOL_NAME, VERSION, exitCodeFor, formatCliError } from "./shared/index.js";

/** Whether to show full stack traces (set DEBUG=1 in env). */
const DEBUG = Boolean(process.env.DEBUG);

// ── CLI setup ─────────────────────────────────────────────────────────

const program = new Command();

program
  .name(TOOL_NAME)
  .description("Generate domain-driven Go code from OpenAPI and Protocol Buffers definitions")
  .version(VERSION);

registerGenerate(program);
registerNew(program);
registerFormats(program);
registerVersion(program);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${formatCliError(err)}`);
  if (DEBUG && err instanceof Error && err.stack) {
    console.error(`\nStack trace:\n${err.stack}`);
  }
  process.exit(exitCodeFor(err));
});
