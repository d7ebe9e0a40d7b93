/**
 * Helpers reading configuration values from an environment-like source. Every
 * reader accepts a list of aliases so deployments can keep their historical
 * variable names (`MCP_RETRY_ATTEMPTS`, `RETRY_ATTEMPTS`, ...) while the first
 * non-empty alias wins.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Key/value view over the process environment (or a test fixture). */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Single variable name or ordered list of aliases. */
export type EnvNames = string | readonly string[];

/** Trims the raw value and collapses blank strings to `undefined`. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function toNameList(names: EnvNames): readonly string[] {
  return typeof names === "string" ? [names] : names;
}

/**
 * Returns the first alias carrying a non-empty value together with the alias
 * itself, so configuration errors can name the variable the operator set.
 */
export function lookupEnv(env: EnvSource, names: EnvNames): { name: string; value: string } | undefined {
  for (const name of toNameList(names)) {
    const value = normaliseEnvValue(env[name]);
    if (value !== undefined) {
      return { name, value };
    }
  }
  return undefined;
}

/** Interprets a human-friendly boolean literal, `undefined` when unrecognised. */
export function parseBooleanLiteral(raw: string): boolean | undefined {
  const lower = raw.trim().toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return undefined;
}
