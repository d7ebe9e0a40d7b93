import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import process from "node:process";

/** Placeholder inserted wherever a secret is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

/** Keys whose values never reach a log line verbatim. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "apikey",
  "token",
  "access_token",
  "refresh_token",
  "cookie",
  "set-cookie",
]);

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHT: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Maps the level literals accepted from the environment (including the
 * `WARNING`/`CRITICAL` spellings inherited from older deployments) to a
 * {@link LogLevel}.
 */
export function parseLogLevel(raw: string): LogLevel | undefined {
  switch (raw.trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "info":
      return "info";
    case "warn":
    case "warning":
      return "warn";
    case "error":
    case "critical":
      return "error";
    default:
      return undefined;
  }
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  logger: string;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Name stamped on every entry (`gateway`, `gateway.audit`, ...). */
  readonly name?: string;
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  /** Optional file mirroring every emitted line. Writes are synchronous. */
  readonly logFile?: string | null;
  /**
   * Literal secrets or patterns scrubbed from every string inside payloads
   * (the upstream API key, typically).
   */
  readonly redactSecrets?: ReadonlyArray<string | RegExp>;
  /** Disables key and secret redaction. Only recording test loggers use it. */
  readonly redactionEnabled?: boolean;
  /** Destination for serialised lines. Defaults to stderr. */
  readonly sink?: (line: string) => void;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger emitting JSON lines. Output goes to stderr by default
 * because stdout carries the MCP stdio transport.
 */
export class StructuredLogger {
  readonly name: string;
  private readonly level: LogLevel;
  private readonly logFile?: string;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly sink: (line: string) => void;
  private readonly entryListener?: (entry: LogEntry) => void;
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.name = options.name ?? "gateway";
    this.level = options.level ?? "info";
    this.logFile = options.logFile ?? undefined;
    this.redactSecrets = (options.redactSecrets ?? []).filter(
      (secret) => typeof secret !== "string" || secret.length > 0,
    );
    this.redactionEnabled = options.redactionEnabled ?? true;
    this.sink = options.sink ?? ((line) => process.stderr.write(line));
    this.entryListener = options.onEntry;
  }

  /** Returns a logger sharing this configuration under another name. */
  child(name: string, overrides: Pick<LoggerOptions, "level"> = {}): StructuredLogger {
    return new StructuredLogger({
      name,
      level: overrides.level ?? this.level,
      logFile: this.logFile ?? null,
      redactSecrets: this.redactSecrets,
      redactionEnabled: this.redactionEnabled,
      sink: this.sink,
      ...(this.entryListener ? { onEntry: this.entryListener } : {}),
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /**
   * Serialises and emits one entry. Sink failures propagate so callers with
   * delivery guarantees (the audit logger) can report them; file mirroring
   * failures are reported on stderr and do not stop the primary sink.
   */
  protected log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const safePayload = payload !== undefined ? this.redact(payload) : undefined;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      logger: this.name,
      message,
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.sink(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    if (this.logFile) {
      this.mirrorToFile(this.logFile, line);
    }
  }

  private mirrorToFile(logFile: string, line: string): void {
    try {
      if (!this.logDirectoryReady) {
        mkdirSync(dirname(logFile), { recursive: true });
        this.logDirectoryReady = true;
      }
      appendFileSync(logFile, line, "utf8");
    } catch (error) {
      const failure = {
        timestamp: new Date().toISOString(),
        level: "error",
        logger: this.name,
        message: "log_file_write_failed",
        payload: { message: error instanceof Error ? error.message : String(error) },
      };
      process.stderr.write(`${JSON.stringify(failure)}\n`);
      this.logDirectoryReady = false;
    }
  }

  private redact(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    return this.deepRedact(value);
  }

  private deepRedact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrubSecrets(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (value instanceof Error) {
      return { name: value.name, message: this.scrubSecrets(value.message) };
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }

  private scrubSecrets(value: string): string {
    let sanitized = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string") {
        sanitized = sanitized.split(pattern).join(REDACTION_TOKEN);
      } else {
        sanitized = sanitized.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitized;
  }
}
