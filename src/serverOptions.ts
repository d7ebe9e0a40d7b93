import { randomUUID } from "node:crypto";

export const TRANSPORTS = ["stdio", "streamable-http"] as const;
export type TransportKind = (typeof TRANSPORTS)[number];

/**
 * Options describing the HTTP exposure of the gateway. Ignored unless the
 * transport is `streamable-http`.
 */
export interface HttpRuntimeOptions {
  /** Listening port for the HTTP server. */
  port: number;
  /** Listening host/interface for the HTTP server. */
  host: string;
  /** Endpoint path (absolute) that processes MCP HTTP calls. */
  path: string;
  /** Whether JSON responses are enabled for the streamable transport. */
  enableJson: boolean;
  /** Use a stateless mode (no session identifiers). */
  stateless: boolean;
}

/** Runtime configuration parsed from CLI arguments. */
export interface GatewayCliOptions {
  command: "run";
  transport: TransportKind;
  http: HttpRuntimeOptions;
  /** Overrides `MCP_LOG_FILE` when set. */
  logFile: string | null;
}

const FLAG_WITH_VALUE = new Set(["--transport", "--http-port", "--http-host", "--http-path", "--log-file"]);

/** Ensures a provided numeric string can be converted to a TCP port. */
function parsePort(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num <= 0 || num > 65_535) {
    throw new Error(`Value ${value} for ${flag} must be a port between 1 and 65535.`);
  }
  return num;
}

function parseTransport(value: string): TransportKind {
  const match = TRANSPORTS.find((transport) => transport === value.trim().toLowerCase());
  if (!match) {
    throw new Error(`Unsupported transport ${value}; expected one of ${TRANSPORTS.join(", ")}.`);
  }
  return match;
}

/** Normalises an HTTP path ensuring it is absolute and non-empty. */
function normalizeHttpPath(raw: string): string {
  const cleaned = raw.trim();
  if (!cleaned.length) {
    throw new Error("The HTTP path cannot be empty.");
  }
  return cleaned.startsWith("/") ? cleaned : `/${cleaned}`;
}

const DEFAULT_HTTP: HttpRuntimeOptions = {
  port: 8765,
  host: "127.0.0.1",
  path: "/mcp",
  enableJson: false,
  stateless: false,
};

/**
 * Parses `process.argv.slice(2)`. The only command is `run`, which is also
 * the default. HTTP flags select the `streamable-http` transport implicitly.
 */
export function parseGatewayCliOptions(argv: readonly string[]): GatewayCliOptions {
  const options: GatewayCliOptions = {
    command: "run",
    transport: "stdio",
    http: { ...DEFAULT_HTTP },
    logFile: null,
  };
  let transportExplicit = false;
  let httpFlagSeen = false;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? "";
    if (!arg.startsWith("--")) {
      if (arg !== "run") {
        throw new Error(`Unknown command ${arg}; expected run.`);
      }
      continue;
    }

    const separator = arg.indexOf("=");
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    let value = separator === -1 ? undefined : arg.slice(separator + 1);

    if (FLAG_WITH_VALUE.has(flag) && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`Flag ${flag} requires a value.`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--transport":
        options.transport = parseTransport(value ?? "");
        transportExplicit = true;
        break;
      case "--http-port":
        options.http.port = parsePort(value ?? "", flag);
        httpFlagSeen = true;
        break;
      case "--http-host": {
        const host = (value ?? "").trim();
        if (!host.length) {
          throw new Error("The HTTP host cannot be empty.");
        }
        options.http.host = host;
        httpFlagSeen = true;
        break;
      }
      case "--http-path":
        options.http.path = normalizeHttpPath(value ?? "");
        httpFlagSeen = true;
        break;
      case "--http-json":
        options.http.enableJson = true;
        httpFlagSeen = true;
        break;
      case "--http-stateless":
        options.http.stateless = true;
        httpFlagSeen = true;
        break;
      case "--log-file": {
        const raw = (value ?? "").trim();
        if (!raw.length) {
          throw new Error("The log file path cannot be empty.");
        }
        options.logFile = raw;
        break;
      }
      default:
        throw new Error(`Unknown flag ${flag}.`);
    }
  }

  if (httpFlagSeen && !transportExplicit) {
    options.transport = "streamable-http";
  }
  return options;
}

/** Generates an identifier for Streamable HTTP sessions. */
export function createHttpSessionId(): string {
  return randomUUID();
}
