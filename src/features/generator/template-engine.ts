/**
 * Named-template rendering engine.
 *
 * Every `*.hbs` file in the template directory is compiled once, in an
 * isolated Handlebars environment carrying the helper library. The
 * template name is the file name without `.hbs` (`entity.go.hbs` →
 * `entity.go`), so names stay stable if the directory layout changes.
 *
 * Files whose name starts with `_` are partials: `_imports.hbs` is
 * available to every template as `{{> imports}}` and is not itself a
 * renderable template.
 *
 * Rendering is pure: the same `(name, data)` always yields the same text.
 */
import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import Handlebars from "handlebars";
import { registerHelpers } from "./helpers.js";
import { GeneratorError } from "../../shared/errors.js";
import { templatesDir } from "../../shared/paths.js";

const TEMPLATE_SUFFIX = ".hbs";
const PARTIAL_PREFIX = "_";

export interface TemplateEngineOptions {
  /** Override the template directory (default: bundled templates). */
  templateDir?: string;
}

export class TemplateEngine {
  private readonly templates = new Map<string, HandlebarsTemplateDelegate>();

  constructor(options: TemplateEngineOptions = {}) {
    const dir = options.templateDir ?? templatesDir();
    const hbs = Handlebars.create();
    registerHelpers(hbs);

    let files: string[];
    try {
      files = readdirSync(dir).filter((f) => f.endsWith(TEMPLATE_SUFFIX)).sort();
    } catch (err) {
      throw new GeneratorError("filesystem", `cannot read template directory ${dir}`, err);
    }

    for (const file of files) {
      const name = file.slice(0, -TEMPLATE_SUFFIX.length);
      const source = readFileSync(join(dir, file), "utf-8");
      if (name.startsWith(PARTIAL_PREFIX)) {
        hbs.registerPartial(name.slice(PARTIAL_PREFIX.length), source);
        continue;
      }
      try {
        // compile() is lazy; parse() surfaces syntax errors at load time.
        hbs.parse(source);
        this.templates.set(name, hbs.compile(source, { noEscape: true }));
      } catch (err) {
        throw new GeneratorError("generation", `failed to compile template "${name}"`, err);
      }
    }
  }

  /** Render a named template. Failures name the template and wrap the cause. */
  render(name: string, data: object): string {
    const template = this.templates.get(name);
    if (!template) {
      throw new GeneratorError("generation", `template not found: "${name}"`);
    }
    try {
      return template(data);
    } catch (err) {
      throw new GeneratorError("generation", `failed to render template "${name}"`, err);
    }
  }

  hasTemplate(name: string): boolean {
    return this.templates.has(name);
  }

  /** Template names, sorted. */
  listTemplates(): string[] {
    return [...this.templates.keys()].sort();
  }
}
