/**
 * Generation orchestrator.
 *
 * Turns a {@link DomainModel} into {@link GeneratedFile}s by rendering a
 * fixed sequence of templates per entity, plus a shared event file and,
 * on request, the project scaffold.
 *
 * The factory never touches the filesystem: it only renders. A failure in
 * any artifact aborts that entity's whole batch.
 */
import type {
  DomainModel,
  Entity,
  GeneratedFile,
  Method,
  Property,
  Relation,
} from "../../shared/types/model.js";
import {
  ENTITY_ARTIFACTS,
  ENTITY_ARTIFACT_KINDS,
  artifactPath,
  type EntityArtifactKind,
  type ProjectArtifactKind,
} from "../../shared/types/index.js";
import {
  elementType,
  emptyCheck,
  goImportsFor,
  idString,
  isPrimitive,
  newIdentity,
  type CanonicalType,
} from "../../shared/canonical-types.js";
import { pascalCase } from "../../shared/naming.js";
import { GeneratorError } from "../../shared/errors.js";
import type { Logger } from "../../shared/logger.js";
import { silentLogger } from "../../shared/logger.js";
import { paramName, receiver } from "./helpers.js";
import type { TemplateEngine } from "./template-engine.js";

// ── Template data ─────────────────────────────────────────────────────

/** A derived command or query: a name plus its ordered fields. */
export interface Shape {
  name: string;
  fields: Property[];
}

/** Go imports, grouped as gofmt groups them. */
export interface ImportGroups {
  std: string[];
  external: string[];
}

/** Everything a per-entity template can reference. */
export interface EntityTemplateData {
  /** Go module path of the generated project. */
  project: string;
  name: string;
  varName: string;
  /** Method receiver name. */
  recv: string;
  /** Go field name of the identity property. */
  idName: string;
  idField: Property;
  /** Go expression producing a new identifier. */
  idInit: string;
  /** Identifier-as-string expressions for the variables templates use. */
  idExpr: { self: string; agg: string; cmd: string; query: string; created: string };
  properties: Property[];
  nonIdProperties: Property[];
  /** Parameters of `New<Entity>`: the create command's fields. */
  constructorParams: Property[];
  /** Whether any constructor parameter gets an emptiness check. */
  hasRequiredChecks: boolean;
  events: string[];
  methods: Method[];
  relations: Relation[];
  commands: { create: Shape; update: Shape; delete: Shape };
  queries: { get: Shape; list: Shape };
  imports: ImportGroups;
}

export interface ProjectTemplateData {
  projectName: string;
  modulePath: string;
  goVersion: string;
  hasDatabase: boolean;
  entities: Array<{ name: string; fileName: string }>;
  sourceFormat: string;
}

export interface GenerateModelOptions {
  /** Checked between entities; an aborted signal stops generation. */
  signal?: AbortSignal;
}

export interface ProjectFileOptions {
  /** Include database targets and settings in the scaffold. Default: true. */
  hasDatabase?: boolean;
}

const GO_VERSION = "1.21";
const KSUID = "github.com/segmentio/ksuid";
export const DOMAIN_EVENT_PATH = "internal/domain/event.go";

// ── Shape derivation ──────────────────────────────────────────────────

function isIdentity(p: Property): boolean {
  return p.name.toLowerCase() === "id";
}

/**
 * The entity itself when it already has an identity property named `Id`;
 * a copy with the identity renamed to `Id` when it is spelled otherwise
 * (`ID`, `id`), since `ID` is also the accessor method; otherwise a copy
 * with `Id` (canonical identity type) injected first.
 */
export function ensureIdentity(entity: Entity): Entity {
  const existing = entity.properties.find(isIdentity);
  if (existing) {
    if (existing.name === "Id") return entity;
    return {
      ...entity,
      properties: entity.properties.map((p) => (p === existing ? { ...p, name: "Id" } : p)),
    };
  }
  const id: Property = {
    name: "Id",
    type: "identity",
    required: true,
    tags: { json: "id" },
    source: { format: "synthetic", reason: "identity" },
  };
  return { ...entity, properties: [id, ...entity.properties] };
}

function identityOf(entity: Entity): Property {
  const id = entity.properties.find(isIdentity);
  if (!id) {
    throw new GeneratorError("generation", `entity ${entity.name} has no identity property`);
  }
  return id;
}

function paginationField(name: string, defaultValue: string): Property {
  return {
    name,
    type: "int",
    required: false,
    defaultValue,
    tags: { json: name.toLowerCase() },
    source: { format: "synthetic", reason: "pagination" },
  };
}

/** Create / Update / Delete command shapes. */
export function commandShapes(entity: Entity): EntityTemplateData["commands"] {
  const id = identityOf(entity);
  return {
    create: {
      name: `Create${entity.name}Command`,
      fields: entity.properties.filter((p) => p.required && !isIdentity(p)),
    },
    update: { name: `Update${entity.name}Command`, fields: [...entity.properties] },
    delete: { name: `Delete${entity.name}Command`, fields: [id] },
  };
}

/** Get-by-id / List query shapes; List pages with `Limit` 10, `Offset` 0. */
export function queryShapes(entity: Entity): EntityTemplateData["queries"] {
  return {
    get: { name: `Get${entity.name}ByIdQuery`, fields: [identityOf(entity)] },
    list: {
      name: `List${entity.name}Query`,
      fields: [paginationField("Limit", "10"), paginationField("Offset", "0")],
    },
  };
}

// ── Name checks ───────────────────────────────────────────────────────

/** Types declared by the shared event file in the domain package. */
const SHARED_DOMAIN_TYPES: ReadonlySet<string> = new Set(["Event", "BaseEvent"]);

/**
 * Methods declared on the generated aggregate and on its command and
 * query structs; a field of the same name does not compile.
 */
const GENERATED_MEMBERS: ReadonlySet<string> = new Set([
  "ID",
  "Version",
  "IsDeleted",
  "Update",
  "Delete",
  "UncommittedEvents",
  "MarkEventsAsCommitted",
  "LoadFromHistory",
  "CommandType",
  "QueryType",
]);

/** Properties and methods of `entity` must not shadow generated members or each other. */
export function checkEntityMembers(entity: Entity): void {
  const fields = new Set<string>();
  for (const prop of ensureIdentity(entity).properties) {
    const field = pascalCase(prop.name);
    if (GENERATED_MEMBERS.has(field)) {
      throw new GeneratorError(
        "generation",
        `property ${prop.name} of ${entity.name} clashes with the generated ${field} method; rename the property`,
      );
    }
    fields.add(field);
  }
  for (const method of entity.methods) {
    if (GENERATED_MEMBERS.has(method.name) || fields.has(method.name)) {
      throw new GeneratorError(
        "generation",
        `method ${method.name} of ${entity.name} clashes with a generated member of the same name`,
      );
    }
  }
}

/**
 * Entity names must not redeclare the shared event types or another
 * entity's generated types, and no two artifacts may share a path.
 */
export function checkModelNames(model: Pick<DomainModel, "entities">): void {
  const generatedTypes = new Map<string, string>();
  for (const entity of model.entities) {
    for (const type of [...entity.events, `${entity.name}Repository`]) {
      generatedTypes.set(type, entity.name);
    }
  }

  const owners = new Map<string, string>([[DOMAIN_EVENT_PATH, "the shared event file"]]);
  for (const entity of model.entities) {
    if (SHARED_DOMAIN_TYPES.has(entity.name)) {
      throw new GeneratorError(
        "generation",
        `entity name ${entity.name} clashes with the shared domain type of the same name; rename the entity`,
      );
    }
    const owner = generatedTypes.get(entity.name);
    if (owner !== undefined && owner !== entity.name) {
      throw new GeneratorError(
        "generation",
        `entity name ${entity.name} clashes with a type generated for ${owner}; rename the entity`,
      );
    }
    for (const kind of ENTITY_ARTIFACT_KINDS) {
      const path = artifactPath(kind, entity.name);
      const taken = owners.get(path);
      if (taken !== undefined) {
        throw new GeneratorError(
          "generation",
          `entity ${entity.name} would write ${path}, which is already written by ${taken}`,
        );
      }
      owners.set(path, `entity ${entity.name}`);
    }
  }
}

// ── Imports ───────────────────────────────────────────────────────────

function groupImports(paths: Iterable<string>): ImportGroups {
  const all = [...new Set(paths)].sort();
  return {
    std: all.filter((p) => !p.split("/")[0].includes(".") && !p.includes("/internal/")),
    external: all.filter((p) => p.split("/")[0].includes(".") || p.includes("/internal/")),
  };
}

function referencesEntity(types: Iterable<CanonicalType>): boolean {
  for (const t of types) {
    if (!isPrimitive(elementType(t))) return true;
  }
  return false;
}

/** Imports each artifact kind's rendered code uses, and nothing more. */
function importsFor(kind: EntityArtifactKind, data: Omit<EntityTemplateData, "imports">): ImportGroups {
  const domainPkg = `${data.project}/internal/domain`;
  const infraPkg = `${data.project}/internal/infrastructure`;
  const idType = data.idField.type;
  const idNeedsFmt = idType !== "identity" && idType !== "string";
  const propTypes = data.properties.map((p) => p.type);
  const createTypes = data.constructorParams.map((p) => p.type);
  const fmtIfNeeded = idNeedsFmt ? ["fmt"] : [];

  switch (kind) {
    case "entity": {
      const paths = [...goImportsFor(propTypes), ...fmtIfNeeded];
      if (data.hasRequiredChecks) paths.push("errors");
      if (idType === "string") paths.push(KSUID);
      return groupImports(paths);
    }
    case "events":
      return groupImports(fmtIfNeeded);
    case "repository_interface":
      return groupImports(["context"]);
    case "repository_implementation":
      return groupImports(["context", "sort", "sync", domainPkg]);
    case "commands": {
      const paths = goImportsFor(propTypes);
      if (referencesEntity(propTypes)) paths.push(domainPkg);
      return groupImports(paths);
    }
    case "queries":
      return groupImports(goImportsFor([idType]));
    case "command_handlers":
      return groupImports(["context", "fmt", domainPkg, ...fmtIfNeeded]);
    case "query_handlers":
      return groupImports(["context", domainPkg, ...fmtIfNeeded]);
    case "service":
      return groupImports(["context", domainPkg]);
    case "entity_test":
      return groupImports(["testing", ...goImportsFor(createTypes)]);
    case "events_test":
    case "commands_test":
    case "queries_test":
      return groupImports(["testing"]);
    case "repository_test":
      return groupImports(["context", "errors", "testing", domainPkg, ...goImportsFor(createTypes)]);
    case "command_handlers_test":
      return groupImports([
        "context",
        "errors",
        "testing",
        domainPkg,
        infraPkg,
        ...goImportsFor(createTypes),
      ]);
    case "query_handlers_test":
    case "service_test":
      return groupImports(["context", "testing", domainPkg, infraPkg]);
  }
}

// ── Factory ───────────────────────────────────────────────────────────

export class ComponentFactory {
  private readonly logger: Logger;

  constructor(
    private readonly engine: TemplateEngine,
    logger?: Logger,
  ) {
    this.logger = logger ?? silentLogger();
  }

  /** Template data for one entity; the identity property is ensured first. */
  entityData(entity: Entity, model: Pick<DomainModel, "projectName" | "relations">): Omit<EntityTemplateData, "imports"> {
    const withId = ensureIdentity(entity);
    const idField = identityOf(withId);
    const idName = pascalCase(idField.name);
    const commands = commandShapes(withId);
    const constructorParams = commands.create.fields;
    const self = receiver(withId.name);

    return {
      project: model.projectName,
      name: withId.name,
      varName: paramName(withId.name),
      recv: self,
      idName,
      idField,
      idInit: newIdentity(idField.type),
      idExpr: {
        self: idString(idField.type, `${self}.${idName}`),
        agg: idString(idField.type, `agg.${idName}`),
        cmd: idString(idField.type, `cmd.${idName}`),
        query: idString(idField.type, `q.${idName}`),
        created: idString(idField.type, `created.${idName}`),
      },
      properties: withId.properties,
      nonIdProperties: withId.properties.filter((p) => !isIdentity(p)),
      constructorParams,
      hasRequiredChecks: constructorParams.some((p) => emptyCheck(p.type, "v") !== ""),
      events: withId.events,
      methods: withId.methods,
      relations: model.relations.filter((r) => r.from === withId.name),
      commands,
      queries: queryShapes(withId),
    };
  }

  /** Render one artifact kind for one entity. */
  generateArtifact(
    kind: EntityArtifactKind,
    entity: Entity,
    model: Pick<DomainModel, "projectName" | "relations">,
  ): GeneratedFile {
    const base = this.entityData(entity, model);
    const data: EntityTemplateData = { ...base, imports: importsFor(kind, base) };
    const content = this.engine.render(ENTITY_ARTIFACTS[kind].template, data);
    return {
      path: artifactPath(kind, entity.name),
      content,
      metadata: { type: kind, entity: entity.name },
    };
  }

  /**
   * Every artifact for one entity, in generation order. Any failure
   * discards the batch and names the entity and artifact kind; member
   * name clashes are rejected before anything is rendered.
   */
  generateEntityComponents(
    entity: Entity,
    model: Pick<DomainModel, "projectName" | "relations">,
  ): GeneratedFile[] {
    checkEntityMembers(entity);
    const files: GeneratedFile[] = [];
    for (const kind of ENTITY_ARTIFACT_KINDS) {
      try {
        files.push(this.generateArtifact(kind, entity, model));
      } catch (err) {
        throw new GeneratorError(
          "generation",
          `failed to generate ${kind} for ${entity.name}`,
          err,
        );
      }
      this.logger.debug("Rendered artifact", { entity: entity.name, kind });
    }
    return files;
  }

  /** The shared `Event` interface and `BaseEvent` for the domain package. */
  generateDomainEvent(model: Pick<DomainModel, "projectName">): GeneratedFile {
    const content = this.renderProjectTemplate("domain_event.go", model.projectName, {
      projectName: model.projectName,
    });
    return {
      path: DOMAIN_EVENT_PATH,
      content,
      metadata: { type: "domain_event", project: model.projectName },
    };
  }

  /**
   * Artifacts for every entity plus the shared event file. Names and paths
   * are checked for the whole model first. The signal is consulted before
   * each entity, never during one.
   */
  generateModel(model: DomainModel, options: GenerateModelOptions = {}): GeneratedFile[] {
    checkModelNames(model);
    const files: GeneratedFile[] = [this.generateDomainEvent(model)];
    const total = model.entities.length;

    model.entities.forEach((entity, i) => {
      if (options.signal?.aborted) {
        throw new GeneratorError(
          "generation",
          `generation cancelled before entity ${entity.name}`,
          options.signal.reason,
        );
      }
      this.logger.debug(`[${i + 1}/${total}] Generating entity ${entity.name}`, {
        properties: entity.properties.length,
      });
      files.push(...this.generateEntityComponents(entity, model));
    });

    return files;
  }

  /** Scaffold files for a project, from project-level metadata only. */
  generateProjectFiles(model: DomainModel, options: ProjectFileOptions = {}): GeneratedFile[] {
    const data = this.projectData(model, options);
    const project = model.projectName;
    const files: GeneratedFile[] = [
      this.projectFile(`cmd/${project}/main.go`, "main", "main.go", data),
      this.projectFile("go.mod", "go_mod", "go.mod", data),
      this.projectFile("README.md", "readme", "README.md", data),
      this.generateMakefile(project, data.hasDatabase),
      this.projectFile("config.yaml.example", "config", "config.yaml", data),
    ];
    return files;
  }

  /** The build-automation file on its own. */
  generateMakefile(projectName: string, hasDatabase = true): GeneratedFile {
    const content = this.renderProjectTemplate("Makefile", projectName, {
      projectName,
      hasDatabase,
    });
    return { path: "Makefile", content, metadata: { type: "makefile", project: projectName } };
  }

  private projectData(model: DomainModel, options: ProjectFileOptions): ProjectTemplateData {
    return {
      projectName: model.projectName,
      modulePath: model.projectName,
      goVersion: GO_VERSION,
      hasDatabase: options.hasDatabase ?? true,
      entities: model.entities.map((e) => ({ name: e.name, fileName: e.name.toLowerCase() })),
      sourceFormat: model.metadata.sourceFormat,
    };
  }

  private projectFile(
    path: string,
    type: ProjectArtifactKind,
    template: string,
    data: ProjectTemplateData,
  ): GeneratedFile {
    const content = this.renderProjectTemplate(template, data.projectName, data);
    return { path, content, metadata: { type, project: data.projectName } };
  }

  private renderProjectTemplate(template: string, project: string, data: object): string {
    try {
      return this.engine.render(template, data);
    } catch (err) {
      throw new GeneratorError("generation", `failed to generate ${template} for ${project}`, err);
    }
  }
}
