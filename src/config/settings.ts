import { z } from "zod";

import type { LogLevel } from "../logger.js";
import { parseLogLevel } from "../logger.js";
import { ConfigurationError, type FieldIssue } from "../rpc/errors.js";
import { lookupEnv, parseBooleanLiteral, type EnvNames, type EnvSource } from "./env.js";

/** Dataset identifiers: alphanumeric head followed by up to 127 of `[A-Za-z0-9._:-]`. */
export const DEFAULT_DATASET_ID_PATTERN = "^[A-Za-z0-9][A-Za-z0-9._:-]{0,127}$";

/** Upper bound applied to every `top_k`, configured or requested. */
export const MAX_TOP_K = 1024;

/** Deployment variants, each exposing its own closed set of tools. */
export const TOOLSETS = ["retrieval", "glossary"] as const;
export type Toolset = (typeof TOOLSETS)[number];

/** Resolved gateway configuration. Durations are expressed in milliseconds. */
export interface GatewaySettings {
  readonly apiBaseUrl: string;
  readonly apiKey: string | null;
  readonly httpTimeoutMs: number;
  readonly retryAttempts: number;
  readonly retryWaitMs: number;
  readonly rateLimitCapacity: number;
  readonly rateLimitIntervalMs: number;
  /** Capacity overrides keyed by tool name. */
  readonly toolRateLimits: Readonly<Record<string, number>>;
  readonly maxQueryLength: number;
  readonly maxTerms: number;
  readonly maxTermLength: number;
  readonly datasetIdPattern: RegExp;
  readonly searchTopK: number;
  readonly definitionTopK: number;
  readonly similarityThreshold: number;
  readonly vectorSimilarityWeight: number;
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
  readonly toolset: Toolset;
}

/** Environment aliases, first match wins. */
const ENV = {
  apiBaseUrl: ["MCP_API_BASE_URL", "API_BASE_URL", "LLM_API_BASE_URL"],
  apiKey: ["MCP_API_KEY", "API_KEY", "LLM_API_KEY"],
  requireApiKey: ["MCP_REQUIRE_API_KEY"],
  httpTimeout: ["MCP_HTTP_TIMEOUT", "HTTP_TIMEOUT"],
  retryAttempts: ["MCP_RETRY_ATTEMPTS", "RETRY_ATTEMPTS"],
  retryWait: ["MCP_RETRY_WAIT", "RETRY_WAIT"],
  rateLimitCapacity: ["MCP_RATE_LIMIT_CAPACITY", "RATE_LIMIT_CAPACITY"],
  rateLimitInterval: ["MCP_RATE_LIMIT_INTERVAL_SECONDS", "RATE_LIMIT_INTERVAL_SECONDS"],
  toolRateLimits: ["MCP_TOOL_RATE_LIMITS", "TOOL_RATE_LIMITS"],
  maxQueryLength: ["MCP_MAX_QUERY_LENGTH", "MAX_QUERY_LENGTH"],
  maxTerms: ["MCP_MAX_TERMS", "MAX_TERMS"],
  maxTermLength: ["MCP_MAX_TERM_LENGTH", "MAX_TERM_LENGTH"],
  datasetIdPattern: ["MCP_DATASET_ID_PATTERN", "DATASET_ID_PATTERN"],
  searchTopK: ["MCP_SEARCH_TOP_K", "SEARCH_TOP_K"],
  definitionTopK: ["MCP_DEFINITION_TOP_K", "DEFINITION_TOP_K"],
  similarityThreshold: ["MCP_SIMILARITY_THRESHOLD", "SIMILARITY_THRESHOLD"],
  vectorSimilarityWeight: ["MCP_VECTOR_SIMILARITY_WEIGHT", "VECTOR_SIMILARITY_WEIGHT"],
  logLevel: ["MCP_LOG_LEVEL", "LOG_LEVEL"],
  logFile: ["MCP_LOG_FILE"],
  toolset: ["MCP_TOOLSET"],
} as const satisfies Record<string, EnvNames>;

const positiveInt = z.coerce.number().int().min(1);

/**
 * Schema applied to the raw environment strings. Seconds-based values are
 * converted to milliseconds once validated.
 */
const RawSettingsSchema = z.object({
  apiBaseUrl: z.string().url().default("http://127.0.0.1:8000"),
  apiKey: z.string().optional(),
  requireApiKey: z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) {
        return false;
      }
      const parsed = parseBooleanLiteral(value);
      if (parsed === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected a boolean literal" });
        return z.NEVER;
      }
      return parsed;
    }),
  httpTimeout: z.coerce.number().min(0.5).default(30),
  retryAttempts: positiveInt.default(3),
  retryWait: z.coerce.number().min(0).default(0.5),
  rateLimitCapacity: positiveInt.default(10),
  rateLimitInterval: z.coerce.number().positive().default(60),
  toolRateLimits: z
    .string()
    .optional()
    .transform((value, ctx) => parseToolRateLimits(value, ctx)),
  maxQueryLength: positiveInt.default(256),
  maxTerms: positiveInt.default(10),
  maxTermLength: positiveInt.default(128),
  datasetIdPattern: z
    .string()
    .default(DEFAULT_DATASET_ID_PATTERN)
    .transform((value, ctx) => {
      try {
        return compileFullMatch(value);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
        });
        return z.NEVER;
      }
    }),
  searchTopK: positiveInt.max(MAX_TOP_K).default(8),
  definitionTopK: positiveInt.max(MAX_TOP_K).default(12),
  similarityThreshold: z.coerce.number().min(0).max(1).default(0.2),
  vectorSimilarityWeight: z.coerce.number().min(0).max(1).default(0.3),
  logLevel: z
    .string()
    .default("info")
    .transform((value, ctx) => {
      const level = parseLogLevel(value);
      if (!level) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "Expected one of debug, info, warning, error, critical",
        });
        return z.NEVER;
      }
      return level;
    }),
  logFile: z.string().optional(),
  toolset: z
    .string()
    .default("retrieval")
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(TOOLSETS)),
});

/**
 * Decodes the JSON object of per-tool capacity overrides, e.g.
 * `{"search_glossary": 20}`.
 */
function parseToolRateLimits(raw: string | undefined, ctx: z.RefinementCtx): Record<string, number> {
  if (raw === undefined) {
    return {};
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Tool rate limits must be valid JSON" });
    return z.NEVER;
  }

  const parsed = z.record(z.number().int().min(1)).safeParse(decoded);
  if (!parsed.success) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Tool rate limits must be a JSON object mapping tool names to positive integers",
    });
    return z.NEVER;
  }
  return parsed.data;
}

/**
 * Compiles an operator supplied pattern so that it must match the whole value,
 * whether or not the literal already carries `^`/`$` anchors.
 */
export function compileFullMatch(pattern: string): RegExp {
  return new RegExp(`^(?:${pattern})$`);
}

/**
 * Builds the {@link GatewaySettings} from an environment source. Every invalid
 * value is collected into a single {@link ConfigurationError} naming the
 * offending variables.
 */
export function loadGatewaySettings(env: EnvSource = process.env): GatewaySettings {
  const raw: Record<string, string> = {};
  const origins: Record<string, string> = {};
  for (const [key, names] of Object.entries(ENV)) {
    const found = lookupEnv(env, names);
    if (found) {
      raw[key] = found.value;
      origins[key] = found.name;
    }
  }

  const parsed = RawSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues: FieldIssue[] = parsed.error.issues.map((issue) => {
      const key = String(issue.path[0] ?? "settings");
      const variable = origins[key] ?? key;
      return { field: variable, constraint: "configuration", message: `${variable}: ${issue.message}` };
    });
    throw new ConfigurationError(
      `Invalid gateway configuration: ${issues.map((issue) => issue.message).join("; ")}`,
      { issues },
    );
  }

  const values = parsed.data;
  const apiKey = values.apiKey ?? null;
  if (values.requireApiKey && !apiKey) {
    throw new ConfigurationError("An upstream API key is required but none is configured", {
      hint: `Set ${ENV.apiKey[0]}.`,
    });
  }

  return {
    apiBaseUrl: values.apiBaseUrl.replace(/\/+$/, ""),
    apiKey,
    httpTimeoutMs: Math.round(values.httpTimeout * 1000),
    retryAttempts: values.retryAttempts,
    retryWaitMs: Math.round(values.retryWait * 1000),
    rateLimitCapacity: values.rateLimitCapacity,
    rateLimitIntervalMs: Math.round(values.rateLimitInterval * 1000),
    toolRateLimits: Object.freeze({ ...values.toolRateLimits }),
    maxQueryLength: values.maxQueryLength,
    maxTerms: values.maxTerms,
    maxTermLength: values.maxTermLength,
    datasetIdPattern: values.datasetIdPattern,
    searchTopK: values.searchTopK,
    definitionTopK: values.definitionTopK,
    similarityThreshold: values.similarityThreshold,
    vectorSimilarityWeight: values.vectorSimilarityWeight,
    logLevel: values.logLevel,
    logFile: values.logFile ?? null,
    toolset: values.toolset,
  };
}

/** Secrets that must never appear in a log line. */
export function collectRedactionTokens(settings: GatewaySettings): string[] {
  return settings.apiKey ? [settings.apiKey] : [];
}
