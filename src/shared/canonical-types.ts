/**
 * Canonical type vocabulary shared by every adapter and template.
 *
 * A canonical type is a plain string:
 *
 *   string | int | int32 | int64 | uint32 | uint64 | float32 | float64
 *   bool | time | identity | bytes | map | any
 *   []<T>            slice of T
 *   <EntityName>     reference to another entity (PascalCase)
 *
 * The Go rendering of each type lives here too, so adapters never emit
 * target-language type names directly.
 */

/** Built-in (non-reference, non-slice) canonical types. */
export const PRIMITIVE_TYPES = [
  "string",
  "int",
  "int32",
  "int64",
  "uint32",
  "uint64",
  "float32",
  "float64",
  "bool",
  "time",
  "identity",
  "bytes",
  "map",
  "any",
] as const;

export type PrimitiveType = (typeof PRIMITIVE_TYPES)[number];

/** Any canonical type string (primitive, slice or entity reference). */
export type CanonicalType = string;

const SLICE_PREFIX = "[]";

const PRIMITIVE_SET: ReadonlySet<string> = new Set(PRIMITIVE_TYPES);

export function isPrimitive(type: CanonicalType): type is PrimitiveType {
  return PRIMITIVE_SET.has(type);
}

export function sliceOf(element: CanonicalType): CanonicalType {
  return `${SLICE_PREFIX}${element}`;
}

export function isSlice(type: CanonicalType): boolean {
  return type.startsWith(SLICE_PREFIX);
}

/** Element type of a slice; the type itself for non-slices. */
export function elementType(type: CanonicalType): CanonicalType {
  return isSlice(type) ? type.slice(SLICE_PREFIX.length) : type;
}

/** True for a bare entity reference (not a slice of one). */
export function isReference(type: CanonicalType): boolean {
  return !isSlice(type) && !isPrimitive(type);
}

/** True for `X` or `[]X` where `X` names `entity`. */
export function refersTo(type: CanonicalType, entity: string): boolean {
  return elementType(type) === entity;
}

// ── Go rendering ──────────────────────────────────────────────────────

const GO_PRIMITIVES: Record<PrimitiveType, string> = {
  string: "string",
  int: "int",
  int32: "int32",
  int64: "int64",
  uint32: "uint32",
  uint64: "uint64",
  float32: "float32",
  float64: "float64",
  bool: "bool",
  time: "time.Time",
  identity: "ksuid.KSUID",
  bytes: "[]byte",
  map: "map[string]interface{}",
  any: "interface{}",
};

/**
 * Go type for a canonical type.
 *
 * References become pointers; `qualifier` prefixes the referenced
 * entity with its package (`*domain.Address`) for code outside the
 * domain package.
 */
export function toGoType(type: CanonicalType, qualifier?: string): string {
  if (isSlice(type)) return `[]${toGoType(elementType(type), qualifier)}`;
  if (isPrimitive(type)) return GO_PRIMITIVES[type];
  return qualifier ? `*${qualifier}.${type}` : `*${type}`;
}

/**
 * Go zero-value literal keyed by canonical type.
 *
 * Slices, maps, bytes, `any` and entity references (pointers) are `nil`.
 */
export function zeroValue(type: CanonicalType): string {
  if (isSlice(type)) return "nil";
  switch (type) {
    case "string":
      return '""';
    case "int":
    case "int32":
    case "int64":
    case "uint32":
    case "uint64":
      return "0";
    case "float32":
    case "float64":
      return "0.0";
    case "bool":
      return "false";
    case "time":
      return "time.Time{}";
    case "identity":
      return "ksuid.KSUID{}";
    default:
      return "nil";
  }
}

/**
 * Go boolean expression that is true when `expr` holds an empty value of
 * `type`, or `""` for types whose zero value is a legitimate value
 * (numbers, booleans).
 */
export function emptyCheck(type: CanonicalType, expr: string): string {
  if (isSlice(type)) return `len(${expr}) == 0`;
  switch (type) {
    case "string":
      return `${expr} == ""`;
    case "identity":
      return `${expr}.IsNil()`;
    case "time":
      return `${expr}.IsZero()`;
    case "bytes":
    case "map":
      return `len(${expr}) == 0`;
    case "any":
      return `${expr} == nil`;
    default:
      return isPrimitive(type) ? "" : `${expr} == nil`;
  }
}

/** Go imports a set of canonical types needs (sorted, de-duplicated). */
export function goImportsFor(types: Iterable<CanonicalType>): string[] {
  const imports = new Set<string>();
  for (const t of types) {
    const el = elementType(t);
    if (el === "time") imports.add("time");
    if (el === "identity") imports.add("github.com/segmentio/ksuid");
  }
  return [...imports].sort();
}

/**
 * A non-empty Go literal of `type`, for generated tests. References are
 * freshly allocated zero structs.
 */
export function sampleValue(type: CanonicalType, qualifier?: string): string {
  if (isSlice(type)) {
    const el = elementType(type);
    return `${toGoType(type, qualifier)}{${sampleValue(el, qualifier)}}`;
  }
  switch (type) {
    case "string":
      return '"sample"';
    case "int":
    case "int32":
    case "int64":
    case "uint32":
    case "uint64":
      return "1";
    case "float32":
    case "float64":
      return "1.5";
    case "bool":
      return "true";
    case "time":
      return "time.Now()";
    case "identity":
      return "ksuid.New()";
    case "bytes":
      return '[]byte("sample")';
    case "map":
      return 'map[string]interface{}{"key": "value"}';
    case "any":
      return '"value"';
    default:
      return qualifier ? `&${qualifier}.${type}{}` : `&${type}{}`;
  }
}

/** Go expression rendering an identifier value of `type` as a string. */
export function idString(type: CanonicalType, expr: string): string {
  switch (type) {
    case "identity":
      return `${expr}.String()`;
    case "string":
      return expr;
    default:
      return `fmt.Sprint(${expr})`;
  }
}

/** Go expression producing a fresh identifier of `type`. */
export function newIdentity(type: CanonicalType): string {
  switch (type) {
    case "identity":
      return "ksuid.New()";
    case "string":
      return "ksuid.New().String()";
    default:
      return zeroValue(type);
  }
}
