/**
 * Helper library available to every template.
 *
 * Each helper is a plain exported function (so it can be tested on its
 * own) plus a registration that checks the arguments Handlebars passes
 * in. A helper given the wrong kind of argument throws, which surfaces
 * as a render failure naming the template.
 */
import type Handlebars from "handlebars";
import type { Property } from "../../shared/types/model.js";
import {
  camelCase,
  kebabCase,
  pascalCase,
  plural,
  singular,
  snakeCase,
} from "../../shared/naming.js";
import { emptyCheck, sampleValue, toGoType, zeroValue } from "../../shared/canonical-types.js";

// ── Go-specific builders ──────────────────────────────────────────────

const GO_KEYWORDS = new Set([
  "break", "case", "chan", "const", "continue", "default", "defer", "else",
  "fallthrough", "for", "func", "go", "goto", "if", "import", "interface",
  "map", "package", "range", "return", "select", "struct", "switch", "type", "var",
]);

/** `json:"snake_name"` for required fields, `json:"snake_name,omitempty"` otherwise. */
export function jsonTag(name: string, required: boolean): string {
  return `json:"${snakeCase(name)}${required ? "" : ",omitempty"}"`;
}

/** `validate:"required,<rules>"`, or `""` when there is nothing to validate. */
export function validationTag(property: Property): string {
  const tokens: string[] = [];
  if (property.required) tokens.push("required");
  if (property.validation) tokens.push(property.validation);
  return tokens.length > 0 ? `validate:"${tokens.join(",")}"` : "";
}

/**
 * Full backquoted struct tag: json, then validate, then any other
 * serialization tags the adapter recorded (e.g. `protobuf`).
 */
export function structTag(property: Property): string {
  const parts = [jsonTag(property.name, property.required)];
  const validate = validationTag(property);
  if (validate) parts.push(validate);
  for (const [key, value] of Object.entries(property.tags)) {
    if (key === "json" || key === "validate") continue;
    parts.push(`${key}:"${value}"`);
  }
  return `\`${parts.join(" ")}\``;
}

/** Method receiver: the lower-cased first letter of the type name. */
export function receiver(typeName: string): string {
  return typeName.length === 0 ? "x" : typeName[0].toLowerCase();
}

/** camelCase identifier that is never a Go keyword. */
export function paramName(name: string): string {
  const ident = camelCase(name);
  return GO_KEYWORDS.has(ident) ? `${ident}_` : ident;
}

/** Prefix every non-empty line with `levels` tabs. */
export function indent(text: string, levels: number): string {
  const pad = "\t".repeat(Math.max(0, levels));
  return text
    .split("\n")
    .map((line) => (line.length > 0 ? pad + line : line))
    .join("\n");
}

export function filterRequired(properties: readonly Property[]): Property[] {
  return properties.filter((p) => p.required);
}

export function filterOptional(properties: readonly Property[]): Property[] {
  return properties.filter((p) => !p.required);
}

// ── Argument checks ───────────────────────────────────────────────────

function isProperty(value: unknown): value is Property {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "type" in value &&
    typeof value.type === "string" &&
    "required" in value &&
    typeof value.required === "boolean" &&
    "tags" in value &&
    typeof value.tags === "object"
  );
}

function str(helper: string, value: unknown): string {
  if (typeof value !== "string") {
    throw new TypeError(`${helper}: expected a string, got ${value === null ? "null" : typeof value}`);
  }
  return value;
}

/** Optional trailing string argument; Handlebars passes its options object otherwise. */
function optionalStr(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function prop(helper: string, value: unknown): Property {
  if (!isProperty(value)) throw new TypeError(`${helper}: expected a property`);
  return value;
}

function props(helper: string, value: unknown): Property[] {
  if (!Array.isArray(value)) throw new TypeError(`${helper}: expected a list of properties`);
  return value.map((v) => prop(helper, v));
}

// ── Registration ──────────────────────────────────────────────────────

/** Register the helper library on an isolated Handlebars environment. */
export function registerHelpers(hbs: typeof Handlebars): void {
  const stringFn = (name: string, fn: (s: string) => string): void => {
    hbs.registerHelper(name, (value: unknown) => fn(str(name, value)));
  };

  stringFn("lower", (s) => s.toLowerCase());
  stringFn("upper", (s) => s.toUpperCase());
  stringFn("camelCase", camelCase);
  stringFn("pascalCase", pascalCase);
  stringFn("snakeCase", snakeCase);
  stringFn("kebabCase", kebabCase);
  stringFn("plural", plural);
  stringFn("singular", singular);
  stringFn("receiver", receiver);
  stringFn("paramName", paramName);
  stringFn("zeroValue", zeroValue);

  hbs.registerHelper("goType", (type: unknown, qualifier: unknown) =>
    toGoType(str("goType", type), optionalStr(qualifier)),
  );
  hbs.registerHelper("sampleValue", (type: unknown, qualifier: unknown) =>
    sampleValue(str("sampleValue", type), optionalStr(qualifier)),
  );
  hbs.registerHelper("emptyCheck", (type: unknown, expr: unknown) =>
    emptyCheck(str("emptyCheck", type), str("emptyCheck", expr)),
  );
  hbs.registerHelper("jsonTag", (name: unknown, required: unknown) =>
    jsonTag(str("jsonTag", name), required === true),
  );
  hbs.registerHelper("validationTag", (p: unknown) => validationTag(prop("validationTag", p)));
  hbs.registerHelper("structTag", (p: unknown) => structTag(prop("structTag", p)));
  hbs.registerHelper("filterRequired", (list: unknown) => filterRequired(props("filterRequired", list)));
  hbs.registerHelper("filterOptional", (list: unknown) => filterOptional(props("filterOptional", list)));

  hbs.registerHelper("join", (list: unknown, sep: unknown) => {
    if (!Array.isArray(list)) return "";
    return list.map(String).join(optionalStr(sep) ?? ", ");
  });
  hbs.registerHelper("eq", (a: unknown, b: unknown) => a === b);
  hbs.registerHelper("indent", (text: unknown, levels: unknown) =>
    indent(str("indent", text), typeof levels === "number" ? levels : 1),
  );
  hbs.registerHelper("default", (value: unknown, fallback: unknown) =>
    value === undefined || value === null || value === "" ? fallback : value,
  );
}
