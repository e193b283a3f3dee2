/**
 * Tests for the parser registry and format detection.
 */
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ParserRegistry, createDefaultRegistry } from "../registry.js";
import type { DomainParser } from "../parser.js";
import { GeneratorError, isGeneratorError } from "../../../shared/errors.js";
import { createDomainModel } from "../../../shared/types/model.js";

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

/** A parser stub with fixed extensions that accepts everything. */
function stubParser(name: string, extensions: string[]): DomainParser {
  return {
    supportedExtensions: () => extensions,
    formatName: () => name,
    validate: () => {},
    parse: () =>
      createDomainModel({
        projectName: "stub",
        entities: [],
        relations: [],
        metadata: { sourceFormat: "scaffold", generatedBy: "test", version: "0" },
      }),
  };
}

const TMP = join(tmpdir(), `specforge-registry-test-${Date.now()}`);
mkdirSync(TMP, { recursive: true });

try {
  console.log("\n=== Default registry ===");

  const registry = createDefaultRegistry();
  const formats = registry.listFormats();
  assert("two formats", formats.length === 2);
  assert("OpenAPI first", formats[0]?.name === "OpenAPI" && formats[0].extensions.join(",") === ".yaml,.yml,.json");
  assert("Protocol Buffers second", formats[1]?.name === "Protocol Buffers");

  assert("lookup by extension is case-insensitive", registry.getParser("api/Users.YAML").formatName() === "OpenAPI");
  assert("proto by extension", registry.getParser("users.proto").formatName() === "Protocol Buffers");
  assert("lookup by format name", registry.getParserByFormat("protocol buffers").formatName() === "Protocol Buffers");

  const unknownExt = caught(() => registry.getParser("notes.txt"));
  assert("unknown extension is a validation error", unknownExt?.kind === "validation");
  assert(
    "unknown extension message",
    unknownExt?.message === "no parser registered for extension .txt (supported: .yaml, .yml, .json, .proto)",
    unknownExt?.message,
  );
  const unknownFormat = caught(() => registry.getParserByFormat("graphql"));
  assert("unknown format lists the available ones", unknownFormat?.message === 'unknown format "graphql" (available: OpenAPI, Protocol Buffers)');

  console.log("\n=== Registration ===");

  const custom = new ParserRegistry();
  const empty = caught(() => custom.register(stubParser("Empty", [])));
  assert("parser without extensions rejected", empty?.kind === "validation");
  const stub = stubParser("Stub", [".STUB"]);
  custom.register(stub);
  custom.register(stub);
  assert("extensions stored lower-cased", custom.getParser("model.stub").formatName() === "Stub");
  const later = stubParser("Later", [".stub"]);
  custom.register(later);
  assert("later registration wins the extension", custom.getParser("model.stub") === later);
  assert("formats listed once, in registration order", custom.listFormats().map((f) => f.name).join(",") === "Stub,Later");

  console.log("\n=== Detect format ===");

  const protoFile = join(TMP, "orders.proto");
  writeFileSync(protoFile, 'syntax = "proto3";\nmessage Order { string order_id = 1; }\n', "utf-8");
  assert("detects a valid proto file", registry.detectFormat(protoFile).formatName() === "Protocol Buffers");

  const badYaml = join(TMP, "broken.yaml");
  writeFileSync(badYaml, 'openapi: "3.0.0"\ninfo:\n  title: Broken\n  version: "1"\n', "utf-8");
  const detectErr = caught(() => registry.detectFormat(badYaml));
  assert("detection failure keeps the stage kind", detectErr?.kind === "parse", detectErr?.kind);
  assert("detection failure names the format", detectErr?.message === `${badYaml} does not validate as OpenAPI`);
  assert("detection failure wraps the cause", detectErr?.cause instanceof GeneratorError);
} finally {
  rmSync(TMP, { recursive: true, force: true });
}

console.log(`\n${passed} passed, ${failed} failed`);
if (failed > 0) process.exit(1);
