/**
 * Extension-keyed lookup of format adapters.
 *
 * A registry is an ordinary value: the CLI builds one with
 * {@link createDefaultRegistry} and hands it to the pipeline, tests build
 * their own.
 */
import { extname } from "node:path";
import type { DomainParser } from "./parser.js";
import { OpenApiParser } from "./openapi-parser.js";
import { ProtoParser } from "./proto-parser.js";
import { GeneratorError, isGeneratorError } from "../../shared/errors.js";

/** One row of {@link ParserRegistry.listFormats}. */
export interface FormatInfo {
  name: string;
  extensions: readonly string[];
}

export class ParserRegistry {
  private readonly byExtension = new Map<string, DomainParser>();
  private readonly parsers: DomainParser[] = [];

  /**
   * Register an adapter under each of its extensions. A later adapter
   * claiming the same extension replaces the earlier one for that
   * extension.
   */
  register(parser: DomainParser): void {
    const extensions = parser.supportedExtensions();
    if (extensions.length === 0) {
      throw new GeneratorError(
        "validation",
        `parser ${parser.formatName()} must support at least one file extension`,
      );
    }
    for (const ext of extensions) {
      this.byExtension.set(ext.toLowerCase(), parser);
    }
    if (!this.parsers.includes(parser)) this.parsers.push(parser);
  }

  /** The adapter registered for `filePath`'s extension. */
  getParser(filePath: string): DomainParser {
    const ext = extname(filePath).toLowerCase();
    const parser = this.byExtension.get(ext);
    if (!parser) {
      throw new GeneratorError(
        "validation",
        `no parser registered for extension ${ext || "(none)"} (supported: ${[...this.byExtension.keys()].join(", ")})`,
      );
    }
    return parser;
  }

  /** Look up an adapter by its display name, case-insensitively. */
  getParserByFormat(formatName: string): DomainParser {
    const wanted = formatName.toLowerCase();
    const parser = this.parsers.find((p) => p.formatName().toLowerCase() === wanted);
    if (!parser) {
      throw new GeneratorError(
        "validation",
        `unknown format "${formatName}" (available: ${this.listFormats().map((f) => f.name).join(", ")})`,
      );
    }
    return parser;
  }

  /** Registered formats, in registration order. */
  listFormats(): FormatInfo[] {
    return this.parsers.map((p) => ({ name: p.formatName(), extensions: p.supportedExtensions() }));
  }

  /**
   * Pick the adapter for `filePath` by extension and confirm it accepts
   * the file. Validation failures are wrapped with the detected format
   * and keep the kind of the failing stage.
   */
  detectFormat(filePath: string): DomainParser {
    const parser = this.getParser(filePath);
    try {
      parser.validate(filePath);
    } catch (err) {
      throw new GeneratorError(
        isGeneratorError(err) ? err.kind : "validation",
        `${filePath} does not validate as ${parser.formatName()}`,
        err,
      );
    }
    return parser;
  }
}

/** A registry holding the OpenAPI and Protocol Buffer adapters. */
export function createDefaultRegistry(): ParserRegistry {
  const registry = new ParserRegistry();
  registry.register(new OpenApiParser());
  registry.register(new ProtoParser());
  return registry;
}
