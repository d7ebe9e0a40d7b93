import type { GatewaySettings, Toolset } from "../config/settings.js";
import { ConfigurationError } from "../rpc/errors.js";
import type { RetrievalRequestBody, UpstreamOperation } from "../upstream/operations.js";

/** Names exposed by each deployment variant. */
export const TOOL_NAMES = {
  retrieval: ["search_glossary", "retrieve_docs"],
  glossary: ["list_glossaries", "get_glossary", "search_terms", "retrieve_definitions"],
} as const satisfies Record<Toolset, readonly string[]>;

export type ToolName = (typeof TOOL_NAMES)[Toolset][number];

export type ArgumentKind = "dataset_id" | "free_text" | "text_list" | "top_k" | "flag" | "optional_text";

export interface ArgumentSpec {
  readonly name: string;
  readonly kind: ArgumentKind;
  readonly required: boolean;
  readonly description: string;
  /** Value applied when an optional `top_k` is omitted. */
  readonly defaultValue?: number;
}

/** Value of one argument once validated and normalised. */
export type ArgumentValue = string | readonly string[] | number | boolean;

export type ValidatedArguments = Readonly<Record<string, ArgumentValue | undefined>>;

export interface ToolDescriptor {
  readonly name: ToolName;
  readonly title: string;
  readonly description: string;
  readonly rateLimitKey: string;
  readonly arguments: readonly ArgumentSpec[];
  /** Builds the upstream operation from validated arguments. */
  readonly toOperation: (args: ValidatedArguments) => UpstreamOperation;
}

export interface ToolRegistry {
  readonly toolset: Toolset;
  /** Descriptors in catalogue order. */
  list(): readonly ToolDescriptor[];
  has(name: string): boolean;
  /** @throws ConfigurationError when {@link name} is not part of the active toolset. */
  resolve(name: string): ToolDescriptor;
}

const DEFINITION_PROMPT = "Provide glossary definitions for the following terms:";

export function buildDefinitionQuestion(terms: readonly string[]): string {
  return [DEFINITION_PROMPT, ...terms.map((term) => `- ${term}`)].join("\n");
}

function textArg(args: ValidatedArguments, name: string): string {
  const value = args[name];
  if (typeof value !== "string") {
    throw new ConfigurationError(`Argument ${name} was not validated as text`);
  }
  return value;
}

function optionalTextArg(args: ValidatedArguments, name: string): string | undefined {
  const value = args[name];
  return typeof value === "string" ? value : undefined;
}

function listArg(args: ValidatedArguments, name: string): readonly string[] {
  const value = args[name];
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`Argument ${name} was not validated as a list`);
  }
  return value.filter((entry): entry is string => typeof entry === "string");
}

function numberArg(args: ValidatedArguments, name: string): number {
  const value = args[name];
  if (typeof value !== "number") {
    throw new ConfigurationError(`Argument ${name} was not validated as a number`);
  }
  return value;
}

function flagArg(args: ValidatedArguments, name: string): boolean {
  return args[name] === true;
}

const datasetIdArg: ArgumentSpec = {
  name: "dataset_id",
  kind: "dataset_id",
  required: true,
  description: "Identifier of the glossary dataset.",
};

function topKArg(defaultValue: number): ArgumentSpec {
  return {
    name: "top_k",
    kind: "top_k",
    required: false,
    description: `Maximum number of chunks to return (default ${defaultValue}).`,
    defaultValue,
  };
}

/**
 * Builds the closed tool catalogue for the configured toolset. Descriptors are
 * frozen and rate-limit keys equal tool names. Capacity overrides naming a tool
 * outside the active toolset are rejected.
 */
export function buildToolRegistry(settings: GatewaySettings): ToolRegistry {
  const retrieve = (
    datasetId: string,
    question: string,
    topK: number,
    keyword: boolean,
    highlight: boolean,
  ): UpstreamOperation => {
    const body: RetrievalRequestBody = {
      question,
      top_k: topK,
      similarity_threshold: settings.similarityThreshold,
      vector_similarity_weight: settings.vectorSimilarityWeight,
      keyword,
      highlight,
    };
    return { kind: "retrieve", datasetId, body };
  };

  const catalogue: Record<ToolName, Omit<ToolDescriptor, "name" | "rateLimitKey">> = {
    search_glossary: {
      title: "Search glossary",
      description: "Search a glossary dataset for chunks matching a single term.",
      arguments: [
        datasetIdArg,
        { name: "term", kind: "free_text", required: true, description: "Term to look up." },
        topKArg(settings.searchTopK),
      ],
      toOperation: (args) =>
        retrieve(textArg(args, "dataset_id"), textArg(args, "term"), numberArg(args, "top_k"), false, true),
    },
    retrieve_docs: {
      title: "Retrieve documents",
      description: "Run a retrieval query against a dataset and return the matching chunks.",
      arguments: [
        datasetIdArg,
        { name: "query", kind: "free_text", required: true, description: "Natural language query." },
        topKArg(settings.searchTopK),
        { name: "keyword", kind: "flag", required: false, description: "Enable keyword matching." },
        { name: "highlight", kind: "flag", required: false, description: "Highlight matches in chunks." },
      ],
      toOperation: (args) =>
        retrieve(
          textArg(args, "dataset_id"),
          textArg(args, "query"),
          numberArg(args, "top_k"),
          flagArg(args, "keyword"),
          flagArg(args, "highlight"),
        ),
    },
    list_glossaries: {
      title: "List glossaries",
      description: "List the glossary datasets, optionally filtered by name.",
      arguments: [{ name: "name", kind: "optional_text", required: false, description: "Name filter." }],
      toOperation: (args) => {
        const name = optionalTextArg(args, "name");
        return name !== undefined ? { kind: "list_glossaries", name } : { kind: "list_glossaries" };
      },
    },
    get_glossary: {
      title: "Get glossary",
      description: "Fetch the metadata of one glossary dataset.",
      arguments: [datasetIdArg],
      toOperation: (args) => ({ kind: "get_glossary", datasetId: textArg(args, "dataset_id") }),
    },
    search_terms: {
      title: "Search terms",
      description: "Search a glossary for chunks matching a free text query.",
      arguments: [
        datasetIdArg,
        { name: "query", kind: "free_text", required: true, description: "Query to match." },
        topKArg(settings.searchTopK),
      ],
      toOperation: (args) =>
        retrieve(textArg(args, "dataset_id"), textArg(args, "query"), numberArg(args, "top_k"), false, true),
    },
    retrieve_definitions: {
      title: "Retrieve definitions",
      description: "Retrieve glossary chunks defining each of the given terms.",
      arguments: [
        datasetIdArg,
        { name: "terms", kind: "text_list", required: true, description: "Terms to define." },
        topKArg(settings.definitionTopK),
      ],
      toOperation: (args) =>
        retrieve(
          textArg(args, "dataset_id"),
          buildDefinitionQuestion(listArg(args, "terms")),
          numberArg(args, "top_k"),
          false,
          true,
        ),
    },
  };

  const names: readonly ToolName[] = TOOL_NAMES[settings.toolset];
  const descriptors = new Map<string, ToolDescriptor>();
  for (const name of names) {
    const entry = catalogue[name];
    descriptors.set(
      name,
      Object.freeze({
        ...entry,
        name,
        rateLimitKey: name,
        arguments: Object.freeze(entry.arguments.map((spec) => Object.freeze({ ...spec }))),
      }),
    );
  }

  const unknownOverrides = Object.keys(settings.toolRateLimits).filter((key) => !descriptors.has(key));
  if (unknownOverrides.length > 0) {
    throw new ConfigurationError(
      `Rate limit overrides reference unknown tools: ${unknownOverrides.join(", ")}`,
      { hint: `Available tools: ${names.join(", ")}.`, meta: { toolset: settings.toolset } },
    );
  }

  const ordered = Object.freeze([...descriptors.values()]);
  return {
    toolset: settings.toolset,
    list: () => ordered,
    has: (name) => descriptors.has(name),
    resolve: (name) => {
      const descriptor = descriptors.get(name);
      if (!descriptor) {
        throw new ConfigurationError(`Unknown tool: ${name}`, {
          hint: `Available tools: ${names.join(", ")}.`,
        });
      }
      return descriptor;
    },
  };
}
