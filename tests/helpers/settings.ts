import { loadGatewaySettings, type GatewaySettings } from "../../src/config/settings.js";
import type { EnvSource } from "../../src/config/env.js";

export const TEST_API_KEY = "test-secret";
export const TEST_BASE_URL = "http://upstream.test/api";

/**
 * Settings resolved through the real environment loader so tests exercise
 * the same parsing as production. {@link overrides} are raw variables.
 */
export function createTestSettings(overrides: EnvSource = {}): GatewaySettings {
  return loadGatewaySettings({
    MCP_API_BASE_URL: TEST_BASE_URL,
    MCP_API_KEY: TEST_API_KEY,
    ...overrides,
  });
}
