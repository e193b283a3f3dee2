/**
 * Artifact kinds emitted by the generator and where each one lands.
 *
 * The path of an entity artifact is a function of its layer directory,
 * the lower-cased entity name and the kind's suffix:
 * `internal/<layer>/<lower(name)><suffix>.go`, with `_test` appended for
 * test artifacts.
 */

/** Per-entity artifact kinds, in generation order. */
export const ENTITY_ARTIFACT_KINDS = [
  "entity",
  "events",
  "repository_interface",
  "repository_implementation",
  "commands",
  "queries",
  "command_handlers",
  "query_handlers",
  "service",
  "entity_test",
  "events_test",
  "repository_test",
  "commands_test",
  "queries_test",
  "command_handlers_test",
  "query_handlers_test",
  "service_test",
] as const;

export type EntityArtifactKind = (typeof ENTITY_ARTIFACT_KINDS)[number];

/** Model- and project-level artifact kinds. */
export type ProjectArtifactKind =
  | "domain_event"
  | "main"
  | "go_mod"
  | "makefile"
  | "readme"
  | "config";

export type Layer = "domain" | "infrastructure" | "application";

/** Template, layer and file-name suffix for one entity artifact kind. */
export interface ArtifactLayout {
  template: string;
  layer: Layer;
  suffix: string;
  test: boolean;
}

export const ENTITY_ARTIFACTS: Readonly<Record<EntityArtifactKind, ArtifactLayout>> = {
  entity: { template: "entity.go", layer: "domain", suffix: "", test: false },
  events: { template: "entity_events.go", layer: "domain", suffix: "_events", test: false },
  repository_interface: { template: "repository_interface.go", layer: "domain", suffix: "_repository", test: false },
  repository_implementation: {
    template: "repository_implementation.go",
    layer: "infrastructure",
    suffix: "_repository",
    test: false,
  },
  commands: { template: "commands.go", layer: "application", suffix: "_commands", test: false },
  queries: { template: "queries.go", layer: "application", suffix: "_queries", test: false },
  command_handlers: { template: "command_handlers.go", layer: "application", suffix: "_command_handlers", test: false },
  query_handlers: { template: "query_handlers.go", layer: "application", suffix: "_query_handlers", test: false },
  service: { template: "service.go", layer: "application", suffix: "_service", test: false },
  entity_test: { template: "entity_test.go", layer: "domain", suffix: "", test: true },
  events_test: { template: "entity_events_test.go", layer: "domain", suffix: "_events", test: true },
  repository_test: { template: "repository_test.go", layer: "infrastructure", suffix: "_repository", test: true },
  commands_test: { template: "commands_test.go", layer: "application", suffix: "_commands", test: true },
  queries_test: { template: "queries_test.go", layer: "application", suffix: "_queries", test: true },
  command_handlers_test: {
    template: "command_handlers_test.go",
    layer: "application",
    suffix: "_command_handlers",
    test: true,
  },
  query_handlers_test: {
    template: "query_handlers_test.go",
    layer: "application",
    suffix: "_query_handlers",
    test: true,
  },
  service_test: { template: "service_test.go", layer: "application", suffix: "_service", test: true },
};

/** Relative output path of an entity artifact. */
export function artifactPath(kind: EntityArtifactKind, entityName: string): string {
  const layout = ENTITY_ARTIFACTS[kind];
  const testSuffix = layout.test ? "_test" : "";
  return `internal/${layout.layer}/${entityName.toLowerCase()}${layout.suffix}${testSuffix}.go`;
}

export * from "./model.js";
