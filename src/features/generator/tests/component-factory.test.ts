/**
 * Tests for the component factory: identity injection, command/query
 * shapes, artifact paths, rendered content and batch failure handling.
 */
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  ComponentFactory,
  DOMAIN_EVENT_PATH,
  checkEntityMembers,
  commandShapes,
  ensureIdentity,
  queryShapes,
} from "../component-factory.js";
import { TemplateEngine } from "../template-engine.js";
import { createDomainModel, lifecycleEvents, type Entity, type Property } from "../../../shared/types/model.js";
import { ENTITY_ARTIFACT_KINDS } from "../../../shared/types/index.js";
import { GeneratorError, isGeneratorError } from "../../../shared/errors.js";
import { MemoryLogger } from "../../../shared/logger.js";

let passed = 0;
let failed = 0;

function assert(label: string, condition: boolean, detail?: string) {
  if (condition) {
    console.log(`  OK: ${label}`);
    passed++;
  } else {
    console.error(`FAIL: ${label}${detail ? ` — ${detail}` : ""}`);
    failed++;
  }
}

function caught(fn: () => unknown): GeneratorError | undefined {
  try {
    fn();
  } catch (err) {
    return isGeneratorError(err) ? err : undefined;
  }
  return undefined;
}

function property(name: string, type: string, required: boolean): Property {
  return { name, type, required, tags: { json: name.toLowerCase() } };
}

function entity(name: string, properties: Property[]): Entity {
  return { name, properties, methods: [], events: lifecycleEvents(name) };
}

// ── Fixtures ──────────────────────────────────────────────────────────

const user = entity("User", [
  property("Email", "string", true),
  property("Name", "string", true),
  property("Age", "int", false),
  property("Address", "Address", false),
]);
const address = entity("Address", [property("Street", "string", true)]);
const counter = entity("Counter", [property("Id", "string", true), property("Hits", "int", true)]);

const model = createDomainModel({
  projectName: "user-service",
  entities: [user, address],
  relations: [
    {
      from: "User",
      to: "Address",
      type: "one_to_one",
      cardinality: "1:1",
      metadata: { property: "Address", reference: "#/components/schemas/Address" },
    },
  ],
  metadata: { sourceFormat: "openapi", sourceFile: "user-service.yaml", info: { title: "User Service" } },
});

const engine = new TemplateEngine();
const factory = new ComponentFactory(engine);

// ── Identity and shapes ───────────────────────────────────────────────

console.log("\n=== Identity injection ===");

const withId = ensureIdentity(user);
assert("Id injected first", withId.properties[0]?.name === "Id");
assert("injected Id is an identity", withId.properties[0]?.type === "identity" && withId.properties[0].required);
assert("injected Id marked synthetic", withId.properties[0]?.source?.format === "synthetic");
assert("declared properties follow", withId.properties.slice(1).map((p) => p.name).join(",") === "Email,Name,Age,Address");
assert("source entity untouched", user.properties.length === 4);
assert("entity with an id is returned as is", ensureIdentity(counter) === counter);

console.log("\n=== Command and query shapes ===");

const commands = commandShapes(withId);
assert("create takes required non-id properties", commands.create.fields.map((p) => p.name).join(",") === "Email,Name");
assert("update takes every property", commands.update.fields.map((p) => p.name).join(",") === "Id,Email,Name,Age,Address");
assert("delete takes the id", commands.delete.fields.map((p) => p.name).join(",") === "Id");
assert("command names", commands.create.name === "CreateUserCommand" && commands.delete.name === "DeleteUserCommand");

const queries = queryShapes(withId);
assert("get takes the id", queries.get.name === "GetUserByIdQuery" && queries.get.fields[0]?.name === "Id");
const list = queries.list.fields;
assert("list pages with Limit and Offset", list.map((p) => p.name).join(",") === "Limit,Offset");
assert("list defaults", list[0]?.defaultValue === "10" && list[1]?.defaultValue === "0");

// ── Paths and order ───────────────────────────────────────────────────

console.log("\n=== Entity artifacts ===");

const files = factory.generateEntityComponents(user, model);
assert("one file per artifact kind", files.length === ENTITY_ARTIFACT_KINDS.length, String(files.length));
assert("artifact kinds in order", files.map((f) => f.metadata.type).join(",") === ENTITY_ARTIFACT_KINDS.join(","));
const paths = files.map((f) => f.path);
const expectedPaths = [
  "internal/domain/user.go",
  "internal/domain/user_events.go",
  "internal/domain/user_repository.go",
  "internal/infrastructure/user_repository.go",
  "internal/application/user_commands.go",
  "internal/application/user_queries.go",
  "internal/application/user_command_handlers.go",
  "internal/application/user_query_handlers.go",
  "internal/application/user_service.go",
  "internal/domain/user_test.go",
  "internal/domain/user_events_test.go",
  "internal/infrastructure/user_repository_test.go",
  "internal/application/user_commands_test.go",
  "internal/application/user_queries_test.go",
  "internal/application/user_command_handlers_test.go",
  "internal/application/user_query_handlers_test.go",
  "internal/application/user_service_test.go",
];
assert("artifact paths", paths.join("\n") === expectedPaths.join("\n"), paths.join(", "));
assert("files carry the owning entity", files.every((f) => f.metadata.entity === "User"));

// ── Rendered content ──────────────────────────────────────────────────

console.log("\n=== Rendered content ===");

function content(path: string): string {
  return files.find((f) => f.path === path)?.content ?? "";
}

const entityGo = content("internal/domain/user.go");
assert("entity package", entityGo.includes("package domain\n"));
assert("identity field", entityGo.includes('\tId ksuid.KSUID `json:"id" validate:"required"`'));
assert("required field tags", entityGo.includes('\tEmail string `json:"email" validate:"required"`'));
assert("optional reference field", entityGo.includes('\tAddress *Address `json:"address,omitempty"`'));
assert("constructor takes the create fields", entityGo.includes("func NewUser(email string, name string) (*User, error) {"));
assert("empty check on required strings", entityGo.includes('\tif email == "" {\n\t\treturn nil, errors.New("email is required")\n\t}'));
assert("new identity", entityGo.includes("\t\tId: ksuid.New(),"));
assert("entity imports errors", entityGo.includes('\t"errors"\n'));
assert("entity imports ksuid", entityGo.includes('\t"github.com/segmentio/ksuid"\n'));
assert("entity does not import fmt", !entityGo.includes('"fmt"'));
assert("id accessor", entityGo.includes("func (u *User) ID() string {\n\treturn u.Id.String()\n}"));

const eventsGo = content("internal/domain/user_events.go");
assert("created event", eventsGo.includes("type UserCreated struct {"));
assert("event snapshot id", eventsGo.includes('NewBaseEvent("UserDeleted", agg.Id.String())'));

const commandsGo = content("internal/application/user_commands.go");
assert("commands reference the domain package", commandsGo.includes('\t"user-service/internal/domain"\n'));
assert("qualified reference in update command", commandsGo.includes('\tAddress *domain.Address `json:"address,omitempty"`'));

const queriesGo = content("internal/application/user_queries.go");
assert("list defaults rendered", queriesGo.includes("\t\tLimit: 10,\n\t\tOffset: 0,"));

const entityTest = content("internal/domain/user_test.go");
assert("rejects empty required fields test", entityTest.includes("func TestNewUserRejectsEmptyRequiredFields(t *testing.T) {"));
assert("sample constructor call", entityTest.includes('NewUser("sample", "sample")'));

const handlersTest = content("internal/application/user_command_handlers_test.go");
assert("test command builder", handlersTest.includes("func newTestUserCommand() CreateUserCommand {"));

assert(
  "rendering is deterministic",
  factory.generateEntityComponents(user, model).every((f, i) => f.content === files[i]?.content),
);

console.log("\n=== String identifiers ===");

const counterModel = createDomainModel({ ...model, entities: [counter], relations: [] });
const counterGo = factory.generateArtifact("entity", counter, counterModel).content;
assert("string id generated from ksuid", counterGo.includes("\t\tId: ksuid.New().String(),"));
assert("string id returned as is", counterGo.includes("\treturn c.Id\n"));
assert("no empty checks for ints", !counterGo.includes('"errors"'));
const counterTest = factory.generateArtifact("entity_test", counter, counterModel).content;
assert("no empty-field test without checks", !counterTest.includes("RejectsEmptyRequiredFields"));

// ── Whole model ───────────────────────────────────────────────────────

console.log("\n=== Whole model ===");

const logger = new MemoryLogger(true);
const all = new ComponentFactory(engine, logger).generateModel(model);
assert("event file first", all[0]?.path === DOMAIN_EVENT_PATH);
assert("event file once plus every entity", all.length === 1 + 2 * ENTITY_ARTIFACT_KINDS.length, String(all.length));
assert("progress logged per entity", logger.lines.includes("[DEBUG] [2/2] Generating entity Address properties=1"));

const controller = new AbortController();
controller.abort();
const cancelled = caught(() => factory.generateModel(model, { signal: controller.signal }));
assert("aborted signal stops before the first entity", cancelled?.message === "generation cancelled before entity User");

// ── Failures ──────────────────────────────────────────────────────────

console.log("\n=== Failures ===");

const TMP = join(tmpdir(), `specforge-factory-test-${Date.now()}`);
mkdirSync(TMP, { recursive: true });
try {
  writeFileSync(join(TMP, "entity.go.hbs"), "package domain\n", "utf-8");
  const partial = new ComponentFactory(new TemplateEngine({ templateDir: TMP }));
  const failure = caught(() => partial.generateEntityComponents(user, model));
  assert("batch fails as a whole", failure?.kind === "generation");
  assert("failure names the artifact and entity", failure?.message === "failed to generate events for User", failure?.message);
  assert(
    "failure keeps the render cause",
    failure?.cause instanceof GeneratorError && failure.cause.message === 'template not found: "entity_events.go"',
  );
} finally {
  rmSync(TMP, { recursive: true, force: true });
}

// ── Name clashes ──────────────────────────────────────────────────────

console.log("\n=== Name clashes ===");

function modelOf(...entities: Entity[]) {
  return createDomainModel({
    projectName: "calendar",
    entities,
    relations: [],
    metadata: { sourceFormat: "openapi", sourceFile: "calendar.yaml", info: {} },
  });
}

const eventEntity = entity("Event", [property("Title", "string", true)]);
const sharedClash = caught(() => factory.generateModel(modelOf(eventEntity)));
assert("entity named Event rejected", sharedClash?.kind === "generation");
assert(
  "shared type clash message",
  sharedClash?.message === "entity name Event clashes with the shared domain type of the same name; rename the entity",
  sharedClash?.message,
);
const baseClash = caught(() => factory.generateModel(modelOf(entity("BaseEvent", []))));
assert("entity named BaseEvent rejected", baseClash?.message.startsWith("entity name BaseEvent clashes") === true);

const pathClash = caught(() =>
  factory.generateModel(modelOf(entity("OrderLine", []), entity("Orderline", []))),
);
assert(
  "entities sharing a file name rejected",
  pathClash?.message === "entity Orderline would write internal/domain/orderline.go, which is already written by entity OrderLine",
  pathClash?.message,
);

const typeClash = caught(() => factory.generateModel(modelOf(entity("User", []), entity("UserCreated", []))));
assert(
  "entity named after another entity's event rejected",
  typeClash?.message === "entity name UserCreated clashes with a type generated for User; rename the entity",
  typeClash?.message,
);

const calendar = factory.generateModel(modelOf(entity("Meeting", []), entity("Calendar", [])));
assert("distinct names generate", calendar.length === 1 + 2 * ENTITY_ARTIFACT_KINDS.length);
assert("paths are unique", new Set(calendar.map((f) => f.path)).size === calendar.length);

const document = entity("Document", [property("Title", "string", true), property("version", "int", false)]);
const versionClash = caught(() => factory.generateEntityComponents(document, model));
assert(
  "property shadowing Version() rejected",
  versionClash?.kind === "generation" &&
    versionClash.message === "property version of Document clashes with the generated Version method; rename the property",
  versionClash?.message,
);
assert(
  "checked for the whole model too",
  caught(() => factory.generateModel(modelOf(document)))?.message === versionClash?.message,
);
assert(
  "command type clash rejected",
  caught(() => checkEntityMembers(entity("Job", [property("command_type", "string", false)])))?.message ===
    "property command_type of Job clashes with the generated CommandType method; rename the property",
);

const updateMethod = { ...entity("Ticket", []), methods: [{ name: "Update", parameters: [] }] };
assert(
  "method shadowing Update() rejected",
  caught(() => checkEntityMembers(updateMethod))?.message ===
    "method Update of Ticket clashes with a generated member of the same name",
);
const fieldMethod = { ...entity("Ticket", [property("Status", "string", true)]), methods: [{ name: "Status", parameters: [] }] };
assert("method shadowing a field rejected", caught(() => checkEntityMembers(fieldMethod)) !== undefined);

const upperId = entity("Account", [property("ID", "identity", true), property("Owner", "string", true)]);
const renamed = ensureIdentity(upperId);
assert("ID renamed to Id", renamed.properties.map((p) => p.name).join(",") === "Id,Owner");
assert("rename keeps the declared identity", renamed.properties[0]?.type === "identity" && renamed.properties.length === 2);
assert("source entity untouched by rename", upperId.properties[0]?.name === "ID");
const accountGo = factory.generateArtifact("entity", upperId, model).content;
assert("identity field rendered as Id", accountGo.includes('\tId ksuid.KSUID `json:"id" validate:"required"`'));
assert("no ID field beside ID()", !accountGo.includes("\tID ksuid.KSUID") && accountGo.includes("func (a *Account) ID() string {"));

// ── Project scaffold ──────────────────────────────────────────────────

console.log("\n=== Project scaffold ===");

const scaffold = factory.generateProjectFiles(model, { hasDatabase: false });
assert(
  "scaffold paths",
  scaffold.map((f) => f.path).join(",") === "cmd/user-service/main.go,go.mod,README.md,Makefile,config.yaml.example",
);
const goMod = scaffold.find((f) => f.path === "go.mod")?.content;
assert("go.mod", goMod === "module user-service\n\ngo 1.21\n\nrequire github.com/segmentio/ksuid v1.0.4\n", goMod);
const mainGo = scaffold.find((f) => f.path === "cmd/user-service/main.go")?.content ?? "";
assert("main wires services", mainGo.includes("application.NewUserService(infrastructure.NewInMemoryUserRepository())"));
assert("no database settings when disabled", !(scaffold.find((f) => f.path === "config.yaml.example")?.content ?? "").includes("database:"));

const makefile = factory.generateMakefile("user-service").content;
assert("Makefile recipes use tabs", makefile.includes("build:\n\tgo build -o $(BINARY) ./cmd/user-service\n"));
assert("migrate target with a database", makefile.includes("\nmigrate:\n"));
assert("no migrate target without one", !factory.generateMakefile("user-service", false).content.includes("migrate"));

console.log(`\n${passed} passed, ${failed} failed`);
if (failed > 0) process.exit(1);
