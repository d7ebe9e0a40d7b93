import { describe, it } from "mocha";
import { expect } from "chai";

import { collectRedactionTokens, compileFullMatch, loadGatewaySettings } from "../../src/config/settings.js";
import { ConfigurationError } from "../../src/rpc/errors.js";

function expectConfigurationError(env: Record<string, string>): ConfigurationError {
  try {
    loadGatewaySettings(env);
  } catch (error) {
    expect(error).to.be.instanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      return error;
    }
  }
  throw new Error("Expected the settings to be rejected");
}

describe("config/settings", () => {
  it("applies the documented defaults", () => {
    const settings = loadGatewaySettings({});

    expect(settings.apiBaseUrl).to.equal("http://127.0.0.1:8000");
    expect(settings.apiKey).to.equal(null);
    expect(settings.httpTimeoutMs).to.equal(30_000);
    expect(settings.retryAttempts).to.equal(3);
    expect(settings.retryWaitMs).to.equal(500);
    expect(settings.rateLimitCapacity).to.equal(10);
    expect(settings.rateLimitIntervalMs).to.equal(60_000);
    expect(settings.toolRateLimits).to.deep.equal({});
    expect(settings.maxQueryLength).to.equal(256);
    expect(settings.maxTerms).to.equal(10);
    expect(settings.maxTermLength).to.equal(128);
    expect(settings.searchTopK).to.equal(8);
    expect(settings.definitionTopK).to.equal(12);
    expect(settings.similarityThreshold).to.equal(0.2);
    expect(settings.vectorSimilarityWeight).to.equal(0.3);
    expect(settings.logLevel).to.equal("info");
    expect(settings.logFile).to.equal(null);
    expect(settings.toolset).to.equal("retrieval");
    expect(settings.datasetIdPattern.test("ds-1")).to.equal(true);
    expect(settings.datasetIdPattern.test("!bad")).to.equal(false);
  });

  it("reads aliases and converts seconds to milliseconds", () => {
    const settings = loadGatewaySettings({
      API_BASE_URL: "https://glossary.example/v1///",
      LLM_API_KEY: "test-secret",
      HTTP_TIMEOUT: "2.5",
      RETRY_WAIT: "0",
      RATE_LIMIT_INTERVAL_SECONDS: "1.5",
      TOOL_RATE_LIMITS: '{"search_glossary": 20}',
      LOG_LEVEL: "WARNING",
      MCP_TOOLSET: "Glossary",
    });

    expect(settings.apiBaseUrl).to.equal("https://glossary.example/v1");
    expect(settings.apiKey).to.equal("test-secret");
    expect(settings.httpTimeoutMs).to.equal(2_500);
    expect(settings.retryWaitMs).to.equal(0);
    expect(settings.rateLimitIntervalMs).to.equal(1_500);
    expect(settings.toolRateLimits).to.deep.equal({ search_glossary: 20 });
    expect(settings.logLevel).to.equal("warn");
    expect(settings.toolset).to.equal("glossary");
  });

  it("anchors operator supplied dataset patterns", () => {
    const settings = loadGatewaySettings({ MCP_DATASET_ID_PATTERN: "[a-z]+" });
    expect(settings.datasetIdPattern.test("legal")).to.equal(true);
    expect(settings.datasetIdPattern.test("legal-1")).to.equal(false);
    expect(compileFullMatch("^ds$").test("ds")).to.equal(true);
  });

  it("names every offending variable in one configuration error", () => {
    const error = expectConfigurationError({
      MCP_RETRY_ATTEMPTS: "0",
      RATE_LIMIT_CAPACITY: "many",
      MCP_SEARCH_TOP_K: "2048",
    });

    expect(error.category).to.equal("CONFIGURATION_ERROR");
    expect(error.code).to.equal(-32603);
    expect(error.data.issues?.map((issue) => issue.field)).to.deep.equal([
      "MCP_RETRY_ATTEMPTS",
      "RATE_LIMIT_CAPACITY",
      "MCP_SEARCH_TOP_K",
    ]);
    expect(error.message.startsWith("Invalid gateway configuration: MCP_RETRY_ATTEMPTS: ")).to.equal(true);
  });

  it("rejects malformed per-tool overrides", () => {
    const notJson = expectConfigurationError({ MCP_TOOL_RATE_LIMITS: "{search_glossary:1}" });
    expect(notJson.data.issues?.[0]?.message).to.equal("MCP_TOOL_RATE_LIMITS: Tool rate limits must be valid JSON");

    const negative = expectConfigurationError({ MCP_TOOL_RATE_LIMITS: '{"search_glossary": -1}' });
    expect(negative.data.issues?.[0]?.field).to.equal("MCP_TOOL_RATE_LIMITS");

    const stringValue = expectConfigurationError({ MCP_TOOL_RATE_LIMITS: '{"search_glossary": "3"}' });
    expect(stringValue.data.issues?.[0]?.field).to.equal("MCP_TOOL_RATE_LIMITS");
  });

  it("rejects invalid patterns, levels, toolsets and URLs", () => {
    const error = expectConfigurationError({
      MCP_DATASET_ID_PATTERN: "([a-z]",
      MCP_LOG_LEVEL: "verbose",
      MCP_TOOLSET: "admin",
      MCP_API_BASE_URL: "not a url",
    });
    expect(error.data.issues?.map((issue) => issue.field)).to.have.members([
      "MCP_DATASET_ID_PATTERN",
      "MCP_LOG_LEVEL",
      "MCP_TOOLSET",
      "MCP_API_BASE_URL",
    ]);
  });

  it("requires an API key when asked to", () => {
    const error = expectConfigurationError({ MCP_REQUIRE_API_KEY: "yes" });
    expect(error.message).to.equal("An upstream API key is required but none is configured");
    expect(error.data.hint).to.equal("Set MCP_API_KEY.");

    const settings = loadGatewaySettings({ MCP_REQUIRE_API_KEY: "true", MCP_API_KEY: "test-secret" });
    expect(collectRedactionTokens(settings)).to.deep.equal(["test-secret"]);
  });

  it("rejects timeouts below half a second", () => {
    const error = expectConfigurationError({ MCP_HTTP_TIMEOUT: "0.1" });
    expect(error.data.issues?.[0]?.field).to.equal("MCP_HTTP_TIMEOUT");
  });
});
