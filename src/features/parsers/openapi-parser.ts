/**
 * OpenAPI 3 adapter.
 *
 * Reads a YAML or JSON OpenAPI document and turns every component schema
 * marked `x-aggregate: true` into an {@link Entity}. Non-aggregate
 * schemas are reachable only as relation targets.
 *
 * Structural validation goes through ajv against
 * `tools/specforge/schema/openapi-document.schema.json`.
 */
import { createRequire } from "node:module";
import { readFileSync } from "node:fs";
import { basename, extname, join } from "node:path";
import type { ValidateFunction } from "ajv";
import type { DomainParser } from "./parser.js";
import { readInputFile } from "./parser.js";
import type { DomainModel, Entity, Property, Relation } from "../../shared/types/model.js";
import { CARDINALITY, createDomainModel, lifecycleEvents } from "../../shared/types/model.js";
import { sliceOf, type CanonicalType } from "../../shared/canonical-types.js";
import { GeneratorError, isYAMLException, describeYamlError } from "../../shared/errors.js";
import { parseYaml } from "../../shared/yaml.js";
import { projectSlug } from "../../shared/naming.js";
import { schemaDir } from "../../shared/paths.js";

// ajv & ajv-formats are CJS packages; use createRequire for ESM interop.
const require = createRequire(import.meta.url);
const Ajv = require("ajv").default as typeof import("ajv").default;
const addFormats = require("ajv-formats").default as typeof import("ajv-formats").default;

// ── Document shape ────────────────────────────────────────────────────

/** The subset of a Schema Object the adapter reads. */
export interface OpenApiSchema {
  $ref?: string;
  type?: string | string[];
  format?: string;
  description?: string;
  properties?: Record<string, OpenApiSchema>;
  items?: OpenApiSchema;
  required?: string[];
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  minimum?: number;
  maximum?: number;
  default?: unknown;
  "x-aggregate"?: unknown;
}

/** The subset of an OpenAPI document the adapter reads. */
export interface OpenApiDocument {
  openapi: string;
  info: { title: string; version: string | number; description?: string };
  components?: { schemas?: Record<string, OpenApiSchema> };
}

const SCHEMA_REF_PREFIX = "#/components/schemas/";

let documentValidator: ValidateFunction<OpenApiDocument> | undefined;

function compileDocumentValidator(): ValidateFunction<OpenApiDocument> {
  if (documentValidator) return documentValidator;
  const ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true });
  addFormats(ajv);
  const schema = JSON.parse(readFileSync(join(schemaDir(), "openapi-document.schema.json"), "utf-8"));
  documentValidator = ajv.compile<OpenApiDocument>(schema);
  return documentValidator;
}

// ── Schema predicates ─────────────────────────────────────────────────

/** First non-`null` entry of a (possibly array-valued) `type`. */
function schemaType(schema: OpenApiSchema): string | undefined {
  const t = schema.type;
  if (Array.isArray(t)) return t.find((entry) => entry !== "null");
  return t;
}

/** `x-aggregate` accepts boolean `true` or the string `"true"` in any case. */
export function isAggregate(schema: OpenApiSchema): boolean {
  const flag = schema["x-aggregate"];
  return flag === true || (typeof flag === "string" && flag.toLowerCase() === "true");
}

function isObjectSchema(schema: OpenApiSchema): boolean {
  return schemaType(schema) === "object";
}

function aggregateNames(doc: OpenApiDocument): string[] {
  const schemas = doc.components?.schemas ?? {};
  return Object.entries(schemas)
    .filter(([, schema]) => isObjectSchema(schema) && isAggregate(schema))
    .map(([name]) => name);
}

// ── Type mapping ──────────────────────────────────────────────────────

function mapStringType(format?: string): CanonicalType {
  switch (format) {
    case "uuid":
      return "identity";
    case "date":
    case "date-time":
      return "time";
    case "byte":
    case "binary":
      return "bytes";
    default:
      return "string";
  }
}

function mapIntegerType(format?: string): CanonicalType {
  if (format === "int32") return "int32";
  if (format === "int64") return "int64";
  return "int";
}

function mapNumberType(format?: string): CanonicalType {
  return format === "float" ? "float32" : "float64";
}

/** Canonical type of an inline (non-`$ref`) scalar schema. */
function mapScalar(schema: OpenApiSchema): CanonicalType {
  switch (schemaType(schema)) {
    case "string":
      return mapStringType(schema.format);
    case "integer":
      return mapIntegerType(schema.format);
    case "number":
      return mapNumberType(schema.format);
    case "boolean":
      return "bool";
    case "object":
      return "map";
    default:
      return "any";
  }
}

/**
 * Constraint tokens, in order: length bounds, pattern, format token for
 * strings; `min`/`max` for numbers.
 */
function validationRules(schema: OpenApiSchema): string {
  const rules: string[] = [];
  const type = schemaType(schema);

  if (type === "string") {
    if (schema.minLength !== undefined && schema.minLength > 0) rules.push(`min=${schema.minLength}`);
    if (schema.maxLength !== undefined && schema.maxLength > 0) rules.push(`max=${schema.maxLength}`);
    if (schema.pattern) rules.push(`regexp=${schema.pattern}`);
    if (schema.format === "email") rules.push("email");
    if (schema.format === "uri") rules.push("uri");
  } else if (type === "integer" || type === "number") {
    if (schema.minimum !== undefined) rules.push(`min=${schema.minimum}`);
    if (schema.maximum !== undefined) rules.push(`max=${schema.maximum}`);
  }

  return rules.join(",");
}

function stringifyDefault(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

// ── Parser ────────────────────────────────────────────────────────────

export class OpenApiParser implements DomainParser {
  supportedExtensions(): readonly string[] {
    return [".yaml", ".yml", ".json"];
  }

  formatName(): string {
    return "OpenAPI";
  }

  validate(filePath: string): void {
    this.load(filePath);
  }

  parse(filePath: string): DomainModel {
    const doc = this.load(filePath);
    const schemas = doc.components?.schemas ?? {};
    const entities: Entity[] = [];
    const relations: Relation[] = [];

    for (const name of aggregateNames(doc)) {
      entities.push(this.convertSchema(name, schemas[name], schemas, relations));
    }

    const title = doc.info.title.trim();
    const projectName = title ? projectSlug(title) : basename(filePath, extname(filePath));

    return createDomainModel({
      projectName,
      entities,
      relations,
      metadata: {
        sourceFormat: "openapi",
        sourceFile: filePath,
        info: {
          title: doc.info.title,
          version: String(doc.info.version),
          description: doc.info.description,
        },
      },
    });
  }

  /** Stages 1–4. Returns the validated document. */
  private load(filePath: string): OpenApiDocument {
    const text = readInputFile(filePath, this);

    let raw: unknown;
    try {
      raw = parseYaml(text, filePath);
    } catch (err) {
      const reason = isYAMLException(err) ? describeYamlError(err) : String(err);
      throw new GeneratorError("parse", `invalid OpenAPI document ${filePath}: ${reason}`, err);
    }

    const check = compileDocumentValidator();
    if (!check(raw)) {
      const problems = (check.errors ?? [])
        .map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`)
        .join("; ");
      throw new GeneratorError("parse", `invalid OpenAPI document ${filePath}: ${problems}`);
    }

    if (aggregateNames(raw).length === 0) {
      throw new GeneratorError(
        "parse",
        `no aggregate schemas found in ${filePath} (mark component schemas with x-aggregate: true)`,
      );
    }
    return raw;
  }

  private convertSchema(
    name: string,
    schema: OpenApiSchema,
    schemas: Record<string, OpenApiSchema>,
    relations: Relation[],
  ): Entity {
    const required = new Set(schema.required ?? []);
    const properties: Property[] = [];

    for (const [propName, propSchema] of Object.entries(schema.properties ?? {})) {
      properties.push(
        this.convertProperty(name, propName, propSchema, required.has(propName), schemas, relations),
      );
    }

    return {
      name,
      properties,
      methods: [],
      events: lifecycleEvents(name),
      source: { format: "openapi", schemaName: name, schema },
    };
  }

  private convertProperty(
    entityName: string,
    name: string,
    schema: OpenApiSchema,
    required: boolean,
    schemas: Record<string, OpenApiSchema>,
    relations: Relation[],
  ): Property {
    let type: CanonicalType;
    let validation = "";

    if (schema.$ref) {
      type = this.resolveRef(entityName, name, schema.$ref, schemas);
      relations.push(relation(entityName, type, "one_to_one", name, schema.$ref));
    } else if (schemaType(schema) === "array") {
      const items = schema.items;
      if (items?.$ref) {
        const target = this.resolveRef(entityName, name, items.$ref, schemas);
        type = sliceOf(target);
        relations.push(relation(entityName, target, "one_to_many", name, items.$ref));
      } else {
        type = sliceOf(items ? mapScalar(items) : "any");
      }
    } else {
      type = mapScalar(schema);
      validation = validationRules(schema);
    }

    const tags: Record<string, string> = { json: name };
    if (validation) tags.validate = validation;

    return {
      name,
      type,
      required,
      defaultValue: stringifyDefault(schema.default),
      validation: validation || undefined,
      tags,
      source: { format: "openapi", schema },
    };
  }

  /** `#/components/schemas/X` → `X`; the target must exist. */
  private resolveRef(
    entityName: string,
    propName: string,
    ref: string,
    schemas: Record<string, OpenApiSchema>,
  ): string {
    if (!ref.startsWith(SCHEMA_REF_PREFIX)) {
      throw new GeneratorError(
        "parse",
        `unsupported reference "${ref}" in ${entityName}.${propName} (only ${SCHEMA_REF_PREFIX}* is supported)`,
      );
    }
    const target = ref.slice(SCHEMA_REF_PREFIX.length);
    if (!Object.hasOwn(schemas, target)) {
      throw new GeneratorError(
        "parse",
        `unresolved reference "${ref}" in ${entityName}.${propName}`,
      );
    }
    return target;
  }
}

function relation(
  from: string,
  to: string,
  type: "one_to_one" | "one_to_many",
  property: string,
  reference: string,
): Relation {
  return { from, to, type, cardinality: CARDINALITY[type], metadata: { property, reference } };
}
