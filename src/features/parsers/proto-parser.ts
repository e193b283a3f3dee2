/**
 * Protocol Buffer adapter.
 *
 * Parses a `.proto` file with protobufjs and turns every top-level
 * message that is not a request/response wrapper into an {@link Entity}.
 * Types are resolved by simple name within the file; imports are not
 * followed.
 */
import { createRequire } from "node:module";
import { basename, extname } from "node:path";
import type { Field, IParserResult, Namespace, ReflectionObject, Type } from "protobufjs";
import type { DomainParser } from "./parser.js";
import { readInputFile } from "./parser.js";
import type {
  DomainModel,
  Entity,
  Property,
  ProtoServiceInfo,
  Relation,
} from "../../shared/types/model.js";
import { CARDINALITY, createDomainModel, lifecycleEvents } from "../../shared/types/model.js";
import { sliceOf, type CanonicalType } from "../../shared/canonical-types.js";
import { GeneratorError } from "../../shared/errors.js";
import { protoFieldName } from "../../shared/naming.js";

// protobufjs is a CJS package; use createRequire for ESM interop.
const require = createRequire(import.meta.url);
const protobuf = require("protobufjs") as typeof import("protobufjs");

// ── Type mapping ──────────────────────────────────────────────────────

const SCALARS = new Map<string, CanonicalType>([
  ["string", "string"],
  ["int32", "int32"],
  ["sint32", "int32"],
  ["sfixed32", "int32"],
  ["int64", "int64"],
  ["sint64", "int64"],
  ["sfixed64", "int64"],
  ["uint32", "uint32"],
  ["fixed32", "uint32"],
  ["uint64", "uint64"],
  ["fixed64", "uint64"],
  ["float", "float32"],
  ["double", "float64"],
  ["bool", "bool"],
  ["bytes", "bytes"],
]);

const WELL_KNOWN = new Map<string, CanonicalType>([["google.protobuf.Timestamp", "time"]]);

const WRAPPER_SUFFIXES = ["Request", "Response", "Req", "Resp"];

/** Request/response wrappers are transport types, not domain entities. */
export function isRequestResponseMessage(name: string): boolean {
  return WRAPPER_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

/** `.pkg.Outer.Inner` → `Inner`. */
function simpleName(typeName: string): string {
  const parts = typeName.split(".");
  return parts[parts.length - 1];
}

// ── Descriptor walking ────────────────────────────────────────────────

interface FileIndex {
  /** Top-level messages, in declaration order. */
  messages: Type[];
  /** Simple names of every enum in the file. */
  enums: Set<string>;
  services: ProtoServiceInfo[];
}

function indexFile(root: Namespace): FileIndex {
  const index: FileIndex = { messages: [], enums: new Set(), services: [] };

  const visit = (ns: Namespace, nestedInMessage: boolean): void => {
    for (const child of ns.nestedArray) {
      if (child instanceof protobuf.Type) {
        if (!nestedInMessage) index.messages.push(child);
        visit(child, true);
      } else if (child instanceof protobuf.Enum) {
        index.enums.add(child.name);
      } else if (child instanceof protobuf.Service) {
        index.services.push({
          name: child.name,
          methods: child.methodsArray.map((m) => ({
            name: m.name,
            inputType: m.requestType,
            outputType: m.responseType,
          })),
        });
      } else if (child instanceof protobuf.Namespace) {
        visit(child, nestedInMessage);
      }
    }
  };

  visit(root, false);
  return index;
}

function stringOption(obj: ReflectionObject | null, name: string): string | undefined {
  const value: unknown = obj?.options?.[name];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

// ── Parser ────────────────────────────────────────────────────────────

interface LoadedFile {
  pkg: string;
  goPackage: string;
  index: FileIndex;
  /** Messages that become entities. */
  candidates: Type[];
}

export class ProtoParser implements DomainParser {
  supportedExtensions(): readonly string[] {
    return [".proto"];
  }

  formatName(): string {
    return "Protocol Buffers";
  }

  validate(filePath: string): void {
    this.load(filePath);
  }

  parse(filePath: string): DomainModel {
    const file = this.load(filePath);
    const entityNames = new Set(file.candidates.map((m) => m.name));
    const entities: Entity[] = [];
    const relations: Relation[] = [];

    for (const message of file.candidates) {
      const properties = message.fieldsArray.map((field) =>
        this.convertField(message.name, field, file.index, entityNames, relations),
      );
      entities.push({
        name: message.name,
        properties,
        methods: [],
        events: lifecycleEvents(message.name),
        source: { format: "protobuf", message: message.name, package: file.pkg },
      });
    }

    return createDomainModel({
      projectName: projectNameFor(file.goPackage, file.pkg, filePath),
      entities,
      relations,
      metadata: {
        sourceFormat: "protobuf",
        sourceFile: filePath,
        package: file.pkg,
        goPackage: file.goPackage,
        services: file.index.services,
      },
    });
  }

  /** Stages 1–4. */
  private load(filePath: string): LoadedFile {
    const source = readInputFile(filePath, this);

    let parsed: IParserResult;
    try {
      parsed = protobuf.parse(source, { keepCase: true });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new GeneratorError("parse", `invalid Protocol Buffer file ${filePath}: ${reason}`, err);
    }

    const pkg = parsed.package ?? "";
    const pkgNamespace = pkg ? parsed.root.lookup(pkg) : null;
    const goPackage =
      stringOption(pkgNamespace, "go_package") ?? stringOption(parsed.root, "go_package") ?? "";

    const index = indexFile(parsed.root);
    if (index.messages.length === 0) {
      throw new GeneratorError("parse", `no message definitions found in ${filePath}`);
    }

    const candidates = index.messages.filter((m) => !isRequestResponseMessage(m.name));
    if (candidates.length === 0) {
      throw new GeneratorError(
        "parse",
        `no domain entities found in ${filePath}: only request/response messages found ` +
          `(${index.messages.map((m) => m.name).join(", ")})`,
      );
    }

    return { pkg, goPackage, index, candidates };
  }

  private convertField(
    entityName: string,
    field: Field,
    index: FileIndex,
    entityNames: ReadonlySet<string>,
    relations: Relation[],
  ): Property {
    const name = protoFieldName(field.name);
    const repeated = field.repeated || field.map;
    const required = !repeated;

    let type: CanonicalType;
    if (field.map) {
      type = "map";
    } else {
      const base = this.mapType(field.type, index, entityNames);
      type = field.repeated ? sliceOf(base) : base;

      if (entityNames.has(base)) {
        const kind = field.repeated ? "one_to_many" : "one_to_one";
        relations.push({
          from: entityName,
          to: base,
          type: kind,
          cardinality: CARDINALITY[kind],
          metadata: { property: name, reference: field.type },
        });
      }
    }

    const tags: Record<string, string> = {
      json: field.name,
      protobuf: `varint,${field.id},opt,name=${field.name}`,
    };
    if (required) tags.validate = "required";

    return {
      name,
      type,
      required,
      tags,
      source: { format: "protobuf", field: field.name, number: field.id, protoType: field.type },
    };
  }

  /**
   * Scalars map through the table, enums to `string`, messages that are
   * entities to a reference, and anything else to `any`.
   */
  private mapType(
    protoType: string,
    index: FileIndex,
    entityNames: ReadonlySet<string>,
  ): CanonicalType {
    const scalar = SCALARS.get(protoType);
    if (scalar) return scalar;

    const qualified = protoType.replace(/^\./, "");
    const known = WELL_KNOWN.get(qualified);
    if (known) return known;

    const name = simpleName(qualified);
    if (index.enums.has(name)) return "string";
    if (entityNames.has(name)) return name;
    return "any";
  }
}

/** Last `go_package` path segment, else the package, else the file stem. */
function projectNameFor(goPackage: string, pkg: string, filePath: string): string {
  if (goPackage) {
    const path = goPackage.split(";")[0];
    const segment = simpleSegment(path);
    if (segment) return segment;
  }
  if (pkg) return pkg.replace(/\./g, "-");
  return basename(filePath, extname(filePath));
}

function simpleSegment(path: string): string {
  const parts = path.split("/").filter((p) => p.length > 0);
  return parts.length > 0 ? parts[parts.length - 1] : "";
}
