/**
 * End-to-end pipeline tests: input document → parse → render → preserve
 * → write, run in process through the same wiring the CLI uses.
 */
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createCodeGenerator, selectInput } from "../src/features/generator/commands/generate.js";
import { DOMAIN_EVENT_PATH } from "../src/features/generator/component-factory.js";
import { ENTITY_ARTIFACT_KINDS } from "../src/shared/types/index.js";
import { MemoryLogger } from "../src/shared/logger.js";
import { isGeneratorError, type GeneratorError } from "../src/shared/errors.js";

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

const PER_ENTITY = ENTITY_ARTIFACT_KINDS.length;

const SHOP_API = `openapi: "3.0.3"
info:
  title: Shop API
  version: "1.0.0"
paths: {}
components:
  schemas:
    Customer:
      type: object
      x-aggregate: true
      required: [email]
      properties:
        email:
          type: string
          format: email
        orders:
          type: array
          items:
            $ref: "#/components/schemas/Order"
    Order:
      type: object
      x-aggregate: true
      required: [total]
      properties:
        total:
          type: number
          format: double
`;

const INVENTORY_PROTO = `syntax = "proto3";
package inventory.v1;

message Product {
  string id = 1;
  string name = 2;
  int32 stock = 3;
}

message GetProductRequest {
  string id = 1;
}

message GetProductResponse {
  Product product = 1;
}

service InventoryService {
  rpc GetProduct(GetProductRequest) returns (GetProductResponse);
}
`;

const TMP = join(tmpdir(), `specforge-pipeline-test-${Date.now()}`);
mkdirSync(TMP, { recursive: true });

try {
  const openapi = join(TMP, "shop.yaml");
  const proto = join(TMP, "inventory.proto");
  writeFileSync(openapi, SHOP_API, "utf-8");
  writeFileSync(proto, INVENTORY_PROTO, "utf-8");

  // ── OpenAPI ─────────────────────────────────────────────────────────

  console.log("\n=== OpenAPI generate ===");

  const out = join(TMP, "shop");
  const first = createCodeGenerator(new MemoryLogger()).generate({
    ...selectInput({ openapi }),
    destination: out,
  });
  assert("project named from the title", first.model.projectName === "shop-api", first.model.projectName);
  assert("both aggregates parsed", first.model.entities.map((e) => e.name).join(",") === "Customer,Order");
  assert("event file plus every artifact", first.written.length === 1 + 2 * PER_ENTITY, String(first.written.length));
  assert("event file written first", first.written[0] === DOMAIN_EVENT_PATH);
  assert("nothing preserved on a fresh run", first.preserved.length === 0);

  const customer = readFileSync(join(out, "internal/domain/customer.go"), "utf-8");
  assert("entity rendered to disk", customer.includes("type Customer struct {"));
  assert("slice of references", customer.includes("\tOrders []*Order `json:\"orders,omitempty\"`"));
  const service = readFileSync(join(out, "internal/application/order_service.go"), "utf-8");
  assert("application layer imports the domain by module path", service.includes('"shop-api/internal/domain"'));

  console.log("\n=== Rerun preserves edits ===");

  const edited = join(out, "internal/domain/customer.go");
  writeFileSync(edited, "package domain\n\n// hand edited\n", "utf-8");
  const logger = new MemoryLogger();
  const second = createCodeGenerator(logger).generate({ ...selectInput({ openapi }), destination: out });
  assert("nothing rewritten", second.written.length === 0);
  assert("everything preserved", second.preserved.length === 1 + 2 * PER_ENTITY);
  assert("edit survives", readFileSync(edited, "utf-8") === "package domain\n\n// hand edited\n");
  assert("preservation summary logged", logger.lines.includes(`[INFO] Preserved ${1 + 2 * PER_ENTITY} existing file(s)`));

  console.log("\n=== Scaffold ===");

  const scaffolded = join(TMP, "scaffolded");
  const withScaffold = createCodeGenerator(new MemoryLogger()).generate({
    ...selectInput({ openapi }),
    destination: scaffolded,
    scaffold: true,
  });
  assert("scaffold adds five files", withScaffold.written.length === 1 + 2 * PER_ENTITY + 5);
  const main = readFileSync(join(scaffolded, "cmd/shop-api/main.go"), "utf-8");
  assert("main wires each service", main.includes("application.NewOrderService(infrastructure.NewInMemoryOrderRepository())"));
  assert("go.mod module path", readFileSync(join(scaffolded, "go.mod"), "utf-8").startsWith("module shop-api\n"));

  // ── Protocol Buffers ────────────────────────────────────────────────

  console.log("\n=== Proto via detection ===");

  const inventory = join(TMP, "inventory");
  const detected = createCodeGenerator(new MemoryLogger()).generate({
    ...selectInput({ input: proto }),
    destination: inventory,
  });
  assert("request/response messages skipped", detected.model.entities.map((e) => e.name).join(",") === "Product");
  assert("project named from the package", detected.model.projectName === "inventory-v1");
  assert("one entity's artifacts", detected.written.length === 1 + PER_ENTITY);
  const product = readFileSync(join(inventory, "internal/domain/product.go"), "utf-8");
  assert("string id kept", product.includes("\t\tId: ksuid.New().String(),"));

  const forced = caught(() =>
    createCodeGenerator(new MemoryLogger()).generate({ ...selectInput({ proto: openapi }), destination: join(TMP, "f") }),
  );
  assert("forced format validates the input", forced !== undefined && !existsSync(join(TMP, "f")));

  // ── Dry run and arguments ───────────────────────────────────────────

  console.log("\n=== Dry run ===");

  const dryOut = join(TMP, "dry");
  const dry = createCodeGenerator(new MemoryLogger()).generate({
    ...selectInput({ openapi }),
    destination: dryOut,
    dryRun: true,
  });
  assert("dry run reports the batch", dry.written.length === 1 + 2 * PER_ENTITY);
  assert("dry run writes nothing", !existsSync(dryOut));

  console.log("\n=== Arguments ===");

  const none = caught(() => selectInput({}));
  assert(
    "an input is required",
    none?.kind === "argument" && none.message === "an input file is required: use --openapi, --proto or --input",
  );
  const both = caught(() => selectInput({ openapi, proto }));
  assert("inputs are exclusive", both?.message === "only one of --openapi, --proto or --input may be given");
  assert("--openapi forces the format", selectInput({ openapi }).format === "OpenAPI");
  assert("--input leaves detection on", selectInput({ input: proto }).format === undefined);

  const missing = caught(() =>
    createCodeGenerator(new MemoryLogger()).generate({ inputFile: join(TMP, "none.yaml"), destination: out }),
  );
  assert("missing input is a filesystem error", missing?.kind === "filesystem");
} finally {
  rmSync(TMP, { recursive: true, force: true });
}

console.log(`\n${passed} passed, ${failed} failed`);
if (failed > 0) process.exit(1);
