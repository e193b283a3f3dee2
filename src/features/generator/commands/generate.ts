/**
 * `specforge generate` command: render the DDD artifact set for every
 * entity in an OpenAPI or Protocol Buffers document.
 */
import type { Command as Cmd } from "commander";
import { CliLogger, silentLogger, type Logger } from "../../../shared/logger.js";
import { GeneratorError } from "../../../shared/errors.js";
import { resolveDestination } from "../../../shared/paths.js";
import { stringifyYaml } from "../../../shared/yaml.js";
import { createDefaultRegistry } from "../../parsers/registry.js";
import { FileExecutor } from "../../project/executor.js";
import { CodeGenerator } from "../code-generator.js";
import { ComponentFactory } from "../component-factory.js";
import { TemplateEngine } from "../template-engine.js";

interface GenerateCommandOptions {
  openapi?: string;
  proto?: string;
  input?: string;
  destination?: string;
  dryRun?: boolean;
  scaffold?: boolean;
  verbose?: boolean;
  json?: boolean;
  printModel?: boolean;
}

/** The one input flag given, with the format it forces (if any). */
export function selectInput(opts: Pick<GenerateCommandOptions, "openapi" | "proto" | "input">): {
  inputFile: string;
  format?: string;
} {
  const given: Array<{ inputFile: string; format?: string }> = [];
  if (opts.openapi !== undefined) given.push({ inputFile: opts.openapi, format: "OpenAPI" });
  if (opts.proto !== undefined) given.push({ inputFile: opts.proto, format: "Protocol Buffers" });
  if (opts.input !== undefined) given.push({ inputFile: opts.input });

  if (given.length !== 1) {
    throw new GeneratorError(
      "argument",
      given.length === 0
        ? "an input file is required: use --openapi, --proto or --input"
        : "only one of --openapi, --proto or --input may be given",
    );
  }
  return given[0];
}

/** Wire the pipeline's collaborators around one logger. */
export function createCodeGenerator(logger: Logger): CodeGenerator {
  return new CodeGenerator({
    registry: createDefaultRegistry(),
    factory: new ComponentFactory(new TemplateEngine(), logger),
    executor: new FileExecutor(logger),
    logger,
  });
}

/** Register the `generate` subcommand. */
export function registerGenerate(program: Cmd): void {
  program
    .command("generate")
    .description("Generate domain, infrastructure and application code from an API definition")
    .option("--openapi <file>", "OpenAPI document (.yaml, .yml, .json)")
    .option("--proto <file>", "Protocol Buffers definition (.proto)")
    .option("--input <file>", "Input file; the format is detected from its extension")
    .option("-d, --destination <dir>", "Output directory", ".")
    .option("--dry-run", "List the files that would be written without writing them")
    .option("--scaffold", "Also generate go.mod, Makefile, README.md, config and main.go")
    .option("--print-model", "Print the parsed domain model as YAML")
    .option("-v, --verbose", "Verbose output with content previews")
    .option("--json", "Output a JSON summary")
    .action((opts: GenerateCommandOptions) => {
      const { inputFile, format } = selectInput(opts);
      const logger = opts.json ? silentLogger() : new CliLogger({ verbose: opts.verbose });
      if (logger instanceof CliLogger) logger.section("code generation");
      const destination = resolveDestination(opts.destination);

      const result = createCodeGenerator(logger).generate({
        inputFile,
        format,
        destination,
        dryRun: opts.dryRun,
        scaffold: opts.scaffold,
      });

      if (opts.printModel) {
        console.log(stringifyYaml(result.model));
      }

      if (opts.json) {
        console.log(JSON.stringify({
          success: true,
          project: result.model.projectName,
          entities: result.model.entities.map((e) => e.name),
          destination,
          dryRun: opts.dryRun ?? false,
          written: result.written,
          preserved: result.preserved,
        }, null, 2));
        return;
      }

      const verb = opts.dryRun ? "Would generate" : "Generated";
      console.log(`\n✓ ${verb} ${result.written.length} file(s) for ${result.model.entities.length} entit${result.model.entities.length === 1 ? "y" : "ies"}.`);
      if (result.preserved.length > 0) {
        console.log(`  Preserved ${result.preserved.length} existing file(s).`);
      }
    });
}
