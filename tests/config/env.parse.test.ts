/**
 * Table-driven tests covering the environment readers shared by the settings
 * loader.
 */
import { describe, it } from "mocha";
import { expect } from "chai";

import { lookupEnv, parseBooleanLiteral } from "../../src/config/env.js";

describe("config/env helpers", () => {
  it("returns the first alias carrying a non-empty value", () => {
    const env = { MCP_RETRY_ATTEMPTS: "  ", RETRY_ATTEMPTS: " 4 " };
    expect(lookupEnv(env, ["MCP_RETRY_ATTEMPTS", "RETRY_ATTEMPTS"])).to.deep.equal({
      name: "RETRY_ATTEMPTS",
      value: "4",
    });
  });

  it("prefers the earliest alias when several are set", () => {
    const env = { MCP_API_KEY: "test-secret", API_KEY: "other-secret" };
    expect(lookupEnv(env, ["MCP_API_KEY", "API_KEY"])?.name).to.equal("MCP_API_KEY");
  });

  it("accepts a single variable name", () => {
    expect(lookupEnv({ MCP_TOOLSET: "glossary" }, "MCP_TOOLSET")?.value).to.equal("glossary");
    expect(lookupEnv({}, "MCP_TOOLSET")).to.equal(undefined);
  });

  it("interprets boolean literals case-insensitively", () => {
    const cases: Array<[string, boolean | undefined]> = [
      ["YES", true],
      ["1", true],
      [" on ", true],
      ["true", true],
      ["No", false],
      ["0", false],
      ["off", false],
      ["FALSE", false],
      ["maybe", undefined],
    ];
    for (const [raw, expected] of cases) {
      expect(parseBooleanLiteral(raw), raw).to.equal(expected);
    }
  });
});
