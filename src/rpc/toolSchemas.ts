import { z } from "zod";

import type { ArgumentKind, ArgumentSpec, ToolDescriptor } from "../tools/registry.js";

const KIND_LABEL: Record<ArgumentKind, string> = {
  dataset_id: "string",
  free_text: "string",
  optional_text: "string",
  text_list: "array of strings",
  top_k: "positive integer",
  flag: "boolean",
};

function describeArgument(spec: ArgumentSpec): string {
  const requirement = spec.required ? "required" : "optional";
  return `${spec.description} (${KIND_LABEL[spec.kind]}, ${requirement})`;
}

/**
 * MCP input shape for a tool. Fields accept any value so that type errors
 * reach the invocation pipeline, which validates, audits and reports them
 * with field-level reasons.
 */
export function buildToolInputShape(descriptor: ToolDescriptor): Record<string, z.ZodUnknown> {
  const shape: Record<string, z.ZodUnknown> = {};
  for (const spec of descriptor.arguments) {
    shape[spec.name] = z.unknown().describe(describeArgument(spec));
  }
  return shape;
}
