import { describe, it } from "mocha";
import { expect } from "chai";

import { ConfigurationError } from "../src/rpc/errors.js";
import { buildDefinitionQuestion, buildToolRegistry } from "../src/tools/registry.js";
import { createTestSettings } from "./helpers/settings.js";

describe("tools/registry", () => {
  it("exposes the retrieval toolset by default", () => {
    const registry = buildToolRegistry(createTestSettings());

    expect(registry.toolset).to.equal("retrieval");
    expect(registry.list().map((descriptor) => descriptor.name)).to.deep.equal(["search_glossary", "retrieve_docs"]);
    expect(registry.has("list_glossaries")).to.equal(false);
  });

  it("exposes the glossary toolset when configured", () => {
    const registry = buildToolRegistry(createTestSettings({ MCP_TOOLSET: "glossary" }));

    expect(registry.list().map((descriptor) => descriptor.name)).to.deep.equal([
      "list_glossaries",
      "get_glossary",
      "search_terms",
      "retrieve_definitions",
    ]);
  });

  it("freezes descriptors and keys rate limits by tool name", () => {
    const registry = buildToolRegistry(createTestSettings());

    for (const descriptor of registry.list()) {
      expect(Object.isFrozen(descriptor)).to.equal(true);
      expect(Object.isFrozen(descriptor.arguments)).to.equal(true);
      expect(descriptor.rateLimitKey).to.equal(descriptor.name);
    }
  });

  it("maps search_glossary onto a highlighted semantic retrieval", () => {
    const registry = buildToolRegistry(createTestSettings());

    const operation = registry
      .resolve("search_glossary")
      .toOperation({ dataset_id: "ds-1", term: "tort", top_k: 8 });

    expect(operation).to.deep.equal({
      kind: "retrieve",
      datasetId: "ds-1",
      body: {
        question: "tort",
        top_k: 8,
        similarity_threshold: 0.2,
        vector_similarity_weight: 0.3,
        keyword: false,
        highlight: true,
      },
    });
  });

  it("forwards the retrieve_docs flags", () => {
    const registry = buildToolRegistry(createTestSettings({ MCP_SIMILARITY_THRESHOLD: "0.5" }));

    const operation = registry
      .resolve("retrieve_docs")
      .toOperation({ dataset_id: "ds-1", query: "lien", top_k: 4, keyword: true, highlight: false });

    expect(operation).to.deep.equal({
      kind: "retrieve",
      datasetId: "ds-1",
      body: {
        question: "lien",
        top_k: 4,
        similarity_threshold: 0.5,
        vector_similarity_weight: 0.3,
        keyword: true,
        highlight: false,
      },
    });
  });

  it("builds glossary operations", () => {
    const registry = buildToolRegistry(createTestSettings({ MCP_TOOLSET: "glossary" }));

    expect(registry.resolve("list_glossaries").toOperation({})).to.deep.equal({ kind: "list_glossaries" });
    expect(registry.resolve("list_glossaries").toOperation({ name: "legal" })).to.deep.equal({
      kind: "list_glossaries",
      name: "legal",
    });
    expect(registry.resolve("get_glossary").toOperation({ dataset_id: "ds-1" })).to.deep.equal({
      kind: "get_glossary",
      datasetId: "ds-1",
    });

    const definitions = registry
      .resolve("retrieve_definitions")
      .toOperation({ dataset_id: "ds-1", terms: ["tort", "lien"], top_k: 12 });
    expect(definitions).to.deep.include({ kind: "retrieve", datasetId: "ds-1" });
    expect(definitions.kind === "retrieve" ? definitions.body.question : undefined).to.equal(
      "Provide glossary definitions for the following terms:\n- tort\n- lien",
    );
  });

  it("formats definition questions one term per line", () => {
    expect(buildDefinitionQuestion(["a"])).to.equal("Provide glossary definitions for the following terms:\n- a");
  });

  it("rejects unknown tools with the available names", () => {
    const registry = buildToolRegistry(createTestSettings());

    try {
      registry.resolve("drop_tables");
      expect.fail("Expected the lookup to fail");
    } catch (error) {
      expect(error).to.be.instanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.message).to.equal("Unknown tool: drop_tables");
        expect(error.data.hint).to.equal("Available tools: search_glossary, retrieve_docs.");
      }
    }
  });

  it("rejects capacity overrides naming tools outside the toolset", () => {
    const settings = createTestSettings({ MCP_TOOL_RATE_LIMITS: '{"search_glossary": 2, "list_glossaries": 5}' });

    expect(() => buildToolRegistry(settings)).to.throw(
      ConfigurationError,
      "Rate limit overrides reference unknown tools: list_glossaries",
    );
  });
});
