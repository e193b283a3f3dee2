/**
 * Naming-convention transforms used by adapters and templates.
 *
 * All converters are total over ASCII identifiers and leave the empty
 * string unchanged. For any identifier `x` without underscores,
 * `snakeCase(pascalCase(x)) === snakeCase(x)`, except where `pascalCase(x)`
 * is the literal `ID` that {@link snakeCase} special-cases: `iD` gives
 * `id` through `pascalCase` and `i_d` on its own.
 */

/** Split on anything that is not a letter or digit. */
function words(s: string): string[] {
  return s.split(/[^A-Za-z0-9]+/).filter((w) => w.length > 0);
}

function upperFirst(s: string): string {
  return s.length === 0 ? s : s[0].toUpperCase() + s.slice(1);
}

function lowerFirst(s: string): string {
  return s.length === 0 ? s : s[0].toLowerCase() + s.slice(1);
}

function isUpper(ch: string): boolean {
  return ch >= "A" && ch <= "Z";
}

/** Insert `sep` before every interior upper-case letter, then lower-case. */
function delimit(s: string, sep: string): string {
  if (s === "ID") return "id";
  let out = "";
  for (let i = 0; i < s.length; i++) {
    const ch = s[i];
    if (i > 0 && isUpper(ch)) out += sep;
    out += ch.toLowerCase();
  }
  return out;
}

/** `user_name`, `user-name`, `userName` → `UserName`. */
export function pascalCase(s: string): string {
  return words(s).map(upperFirst).join("");
}

/** `UserName`, `user_name` → `userName`; an all-caps word is lowered whole (`ID` → `id`). */
export function camelCase(s: string): string {
  const pascal = pascalCase(s);
  if (pascal.length > 0 && pascal === pascal.toUpperCase()) return pascal.toLowerCase();
  return lowerFirst(pascal);
}

/** `UserName` → `user_name`; the literal `ID` becomes `id`. */
export function snakeCase(s: string): string {
  return delimit(s, "_");
}

/** `UserName` → `user-name`. */
export function kebabCase(s: string): string {
  return delimit(s, "-");
}

/**
 * Naive English pluralizer: `y` → `ies`; trailing `s`, `sh`, `ch` → `+es`;
 * otherwise `+s`. Case of the stem is preserved.
 */
export function plural(s: string): string {
  if (s === "") return s;
  const lower = s.toLowerCase();
  if (lower.endsWith("y")) return `${s.slice(0, -1)}ies`;
  if (lower.endsWith("s") || lower.endsWith("sh") || lower.endsWith("ch")) return `${s}es`;
  return `${s}s`;
}

/** Inverse of {@link plural}. */
export function singular(s: string): string {
  if (s === "") return s;
  const lower = s.toLowerCase();
  if (lower.endsWith("ies")) return `${s.slice(0, -3)}y`;
  if (lower.endsWith("sses") || lower.endsWith("shes") || lower.endsWith("ches")) {
    return s.slice(0, -2);
  }
  if (lower.endsWith("s") && s.length > 1) return s.slice(0, -1);
  return s;
}

/**
 * Protocol Buffer field name → Go field name: split on `_`, title-case
 * each segment (first letter upper, rest lower) and concatenate.
 * `user_id` → `UserId`, `a_b_c_d` → `ABCD`.
 */
export function protoFieldName(name: string): string {
  return name
    .split("_")
    .filter((part) => part.length > 0)
    .map((part) => part[0].toUpperCase() + part.slice(1).toLowerCase())
    .join("");
}

/** Lower-cased project slug: spaces and underscores become hyphens. */
export function projectSlug(title: string): string {
  return title.toLowerCase().replace(/[ _]/g, "-");
}
