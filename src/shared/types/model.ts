/**
 * Canonical, format-agnostic domain model.
 *
 * Every format adapter produces a {@link DomainModel}; every generator
 * consumes one. The shapes here are pure data; behaviour lives in the
 * adapters and the component factory.
 */

import type { CanonicalType } from "../canonical-types.js";

// ── Traceability metadata ─────────────────────────────────────────────
//
// Diagnostics only; nothing downstream branches on these values.

/** Where an entity came from. */
export type EntitySource =
  | { format: "openapi"; schemaName: string; schema: unknown }
  | { format: "protobuf"; message: string; package: string }
  | { format: "synthetic" };

/** Where a property came from. */
export type PropertySource =
  | { format: "openapi"; schema: unknown }
  | { format: "protobuf"; field: string; number: number; protoType: string }
  | { format: "synthetic"; reason: "identity" | "pagination" };

/** OpenAPI `info` block as recorded on the model. */
export interface OpenApiInfo {
  title?: string;
  version?: string;
  description?: string;
}

/** A service declared in a `.proto` file. */
export interface ProtoServiceInfo {
  name: string;
  methods: Array<{ name: string; inputType: string; outputType: string }>;
}

/** Model-level metadata, tagged by the source format. */
export type ModelSource =
  | { sourceFormat: "openapi"; sourceFile: string; info: OpenApiInfo }
  | {
      sourceFormat: "protobuf";
      sourceFile: string;
      package: string;
      goPackage: string;
      services: ProtoServiceInfo[];
    }
  | { sourceFormat: "scaffold"; generatedBy: string; version: string };

// ── Model ─────────────────────────────────────────────────────────────

/** A single entity attribute. */
export interface Property {
  /** Attribute name as written in the source document. */
  name: string;
  /** Canonical type (see `canonical-types.ts`). */
  type: CanonicalType;
  /** Independent of the type: a required slice is still a slice. */
  required: boolean;
  /** String-encoded default value. */
  defaultValue?: string;
  /** Comma-joined constraint tokens, e.g. `min=3,max=50,email`. */
  validation?: string;
  /** Serialization tags; always carries at least `json`. */
  tags: Record<string, string>;
  source?: PropertySource;
}

/** A method parameter. */
export interface Parameter {
  name: string;
  type: string;
}

/** A domain behaviour to stub on the generated entity. */
export interface Method {
  name: string;
  description?: string;
  parameters: Parameter[];
  /** Go return type (e.g. `error`, `bool`). Omitted for no return value. */
  returnType?: string;
  /** Method body. When absent a `not implemented` stub is generated. */
  implementation?: string;
}

/** A named domain concept. */
export interface Entity {
  /** PascalCase, unique within a model. */
  name: string;
  properties: Property[];
  methods: Method[];
  /** Lifecycle event names; always seeded with Created/Updated/Deleted. */
  events: string[];
  source?: EntitySource;
}

export type RelationType = "one_to_one" | "one_to_many" | "many_to_many";

/** Human cardinality label for each relation type. */
export const CARDINALITY: Readonly<Record<RelationType, string>> = {
  one_to_one: "1:1",
  one_to_many: "1:N",
  many_to_many: "N:M",
};

/** A directed relationship between two entities. */
export interface Relation {
  from: string;
  to: string;
  type: RelationType;
  cardinality: string;
  metadata: {
    /** The property on `from` that produced this relation. */
    property: string;
    /** The reference token as written (`#/components/schemas/X`, `pkg.X`). */
    reference: string;
  };
}

/** The canonical model produced by one adapter invocation. */
export interface DomainModel {
  projectName: string;
  entities: readonly Entity[];
  relations: readonly Relation[];
  metadata: ModelSource;
}

// ── Generated output ──────────────────────────────────────────────────

/** A rendered artifact, relative to the destination root. */
export interface GeneratedFile {
  readonly path: string;
  readonly content: string;
  readonly metadata: {
    readonly type: string;
    readonly entity?: string;
    readonly project?: string;
  };
}

// ── Construction helpers ──────────────────────────────────────────────

/** The three lifecycle events every entity starts with. */
export function lifecycleEvents(entityName: string): string[] {
  return [`${entityName}Created`, `${entityName}Updated`, `${entityName}Deleted`];
}

/**
 * Build a model and freeze it (and its entity/relation arrays) so that
 * consumers cannot mutate what an adapter returned.
 */
export function createDomainModel(init: {
  projectName: string;
  entities: Entity[];
  relations: Relation[];
  metadata: ModelSource;
}): DomainModel {
  for (const entity of init.entities) {
    for (const prop of entity.properties) Object.freeze(prop);
    Object.freeze(entity.properties);
    Object.freeze(entity);
  }
  for (const relation of init.relations) Object.freeze(relation);

  return Object.freeze({
    projectName: init.projectName,
    entities: Object.freeze([...init.entities]),
    relations: Object.freeze([...init.relations]),
    metadata: init.metadata,
  });
}
