/**
 * The `generate` pipeline:
 *
 *   validate input → pick adapter → Validate → Parse → render
 *     → preserve existing files → write (or preview)
 *
 * Every stage fails with a {@link GeneratorError}; nothing is written
 * unless parsing and rendering both succeeded for every entity.
 */
import type { DomainModel, GeneratedFile } from "../../shared/types/model.js";
import type { Logger } from "../../shared/logger.js";
import type { ParserRegistry } from "../parsers/registry.js";
import type { DomainParser } from "../parsers/parser.js";
import type { FileExecutor } from "../project/executor.js";
import { validateDestination, validateInputFile } from "../project/validator.js";
import type { ComponentFactory } from "./component-factory.js";
import { preserveExistingFiles } from "./preservation.js";

export interface GenerateOptions {
  inputFile: string;
  /** Adapter display name (`OpenAPI`, `Protocol Buffers`); detected from the extension otherwise. */
  format?: string;
  destination: string;
  dryRun?: boolean;
  /** Also render the project scaffold (go.mod, Makefile, main.go, ...). */
  scaffold?: boolean;
  signal?: AbortSignal;
}

export interface GenerateResult {
  model: DomainModel;
  /** Relative paths written, or that would be written in dry-run mode. */
  written: string[];
  /** Relative paths skipped because a file already existed. */
  preserved: string[];
}

export interface CodeGeneratorDeps {
  registry: ParserRegistry;
  factory: ComponentFactory;
  executor: FileExecutor;
  logger: Logger;
}

export class CodeGenerator {
  constructor(private readonly deps: CodeGeneratorDeps) {}

  generate(options: GenerateOptions): GenerateResult {
    const { factory, executor, logger } = this.deps;

    validateInputFile(options.inputFile);
    validateDestination(options.destination);

    const parser = this.selectParser(options);
    logger.info(`Parsing ${parser.formatName()} file`, { path: options.inputFile });
    const model = parser.parse(options.inputFile);
    logger.info("Parsed domain model", {
      project: model.projectName,
      entities: model.entities.length,
      relations: model.relations.length,
    });

    const files: GeneratedFile[] = factory.generateModel(model, { signal: options.signal });
    if (options.scaffold) {
      files.push(...factory.generateProjectFiles(model));
    }
    logger.debug("Rendered files", { count: files.length });

    const { safe, preserved } = preserveExistingFiles(options.destination, files, logger);
    const { files: written } = executor.execute(safe, options.destination, {
      dryRun: options.dryRun,
      signal: options.signal,
    });

    return { model, written, preserved };
  }

  /** The named adapter, validated; or the one detected from the extension. */
  private selectParser(options: GenerateOptions): DomainParser {
    const { registry } = this.deps;
    if (!options.format) return registry.detectFormat(options.inputFile);
    const parser = registry.getParserByFormat(options.format);
    parser.validate(options.inputFile);
    return parser;
  }
}
