/**
 * YAML parse / stringify helpers.
 *
 * Thin wrappers around js-yaml that pin options. OpenAPI documents are
 * read through {@link parseYaml} whether they are YAML or JSON, since
 * JSON is a YAML subset.
 */
import yaml from "js-yaml";

/**
 * Parse a YAML (or JSON) string into an untyped value.
 *
 * Uses the JSON schema so that unquoted timestamps stay strings.
 *
 * @throws {yaml.YAMLException} on malformed YAML.
 */
export function parseYaml(text: string, filename?: string): unknown {
  return yaml.load(text, { schema: yaml.JSON_SCHEMA, filename });
}

/**
 * Stringify a value to a YAML string.
 *
 * Uses block-style scalars and 2-space indent for readability.
 */
export function stringifyYaml(value: unknown): string {
  return yaml.dump(value, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
    sortKeys: false,
  });
}
