import { z } from "zod";

import { MAX_TOP_K } from "../config/settings.js";
import type { FieldIssue } from "../rpc/errors.js";
import type { ArgumentSpec, ArgumentValue, ToolDescriptor, ValidatedArguments } from "./registry.js";

/** Bounds applied by the validator, taken from the settings. */
export interface InputLimits {
  readonly maxQueryLength: number;
  readonly maxTerms: number;
  readonly maxTermLength: number;
  readonly datasetIdPattern: RegExp;
}

export type ValidationOutcome =
  | { readonly ok: true; readonly value: ValidatedArguments }
  | { readonly ok: false; readonly issues: readonly FieldIssue[] };

/** Audit-safe summary of the caller arguments: identifiers, lengths and counts only. */
export type SanitizedArguments = Readonly<Record<string, string | number | boolean>>;

type ArgumentSchema = z.ZodType<ArgumentValue | undefined, z.ZodTypeDef, unknown>;

function fail(ctx: z.RefinementCtx, constraint: string, message: string): never {
  ctx.addIssue({ code: z.ZodIssueCode.custom, message, params: { constraint } });
  return z.NEVER;
}

/** Length in Unicode code points, so astral characters count once. */
export function characterCount(value: string): number {
  return [...value].length;
}

function isMissing(value: unknown): boolean {
  return value === undefined || value === null;
}

function argumentSchema(spec: ArgumentSpec, limits: InputLimits): ArgumentSchema {
  const { maxQueryLength, maxTerms, maxTermLength, datasetIdPattern } = limits;

  return z.unknown().transform((value, ctx): ArgumentValue | undefined => {
    if (isMissing(value)) {
      if (spec.required) {
        return fail(ctx, "required", `${spec.name} is required`);
      }
      if (spec.kind === "top_k") {
        return spec.defaultValue;
      }
      return spec.kind === "flag" ? false : undefined;
    }

    switch (spec.kind) {
      case "dataset_id": {
        if (typeof value !== "string") {
          return fail(ctx, "type", `${spec.name} must be a string`);
        }
        const trimmed = value.trim();
        if (trimmed.length === 0) {
          return fail(ctx, "required", `${spec.name} is required`);
        }
        if (!datasetIdPattern.test(trimmed)) {
          return fail(ctx, "dataset_id_pattern", `${spec.name} does not match the allowed pattern`);
        }
        return trimmed;
      }
      case "free_text":
      case "optional_text": {
        if (typeof value !== "string") {
          return fail(ctx, "type", `${spec.name} must be a string`);
        }
        const trimmed = value.trim();
        if (trimmed.length === 0) {
          return spec.required ? fail(ctx, "required", `${spec.name} must not be empty`) : undefined;
        }
        if (characterCount(trimmed) > maxQueryLength) {
          return fail(
            ctx,
            "max_query_length",
            `${spec.name} exceeds the maximum length of ${maxQueryLength} characters`,
          );
        }
        return trimmed;
      }
      case "text_list": {
        if (!Array.isArray(value)) {
          return fail(ctx, "type", `${spec.name} must be an array of strings`);
        }
        const terms: string[] = [];
        let invalid = false;
        value.forEach((entry: unknown, index) => {
          if (typeof entry !== "string") {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `${spec.name}[${index}] must be a string`,
              path: [index],
              params: { constraint: "type" },
            });
            invalid = true;
            return;
          }
          const trimmed = entry.trim();
          if (trimmed.length === 0) {
            return;
          }
          if (characterCount(trimmed) > maxTermLength) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `${spec.name}[${index}] exceeds the maximum length of ${maxTermLength} characters`,
              path: [index],
              params: { constraint: "max_term_length" },
            });
            invalid = true;
            return;
          }
          terms.push(trimmed);
        });
        if (terms.length > maxTerms) {
          return fail(ctx, "max_terms", `${spec.name} accepts at most ${maxTerms} entries (received ${terms.length})`);
        }
        if (invalid) {
          return z.NEVER;
        }
        if (terms.length === 0) {
          return fail(ctx, "required", `${spec.name} must contain at least one non-empty entry`);
        }
        return terms;
      }
      case "top_k": {
        if (typeof value !== "number" || !Number.isInteger(value)) {
          return fail(ctx, "type", `${spec.name} must be an integer`);
        }
        if (value === 0) {
          return spec.defaultValue;
        }
        if (value < 0) {
          return fail(ctx, "top_k_positive", `${spec.name} must be positive`);
        }
        return Math.min(value, MAX_TOP_K);
      }
      case "flag": {
        if (typeof value !== "boolean") {
          return fail(ctx, "type", `${spec.name} must be a boolean`);
        }
        return value;
      }
    }
  });
}

function compileArguments(descriptor: ToolDescriptor, limits: InputLimits) {
  const shape: Record<string, ArgumentSchema> = {};
  for (const spec of descriptor.arguments) {
    shape[spec.name] = argumentSchema(spec, limits);
  }
  return z.object(shape).strict();
}

type ArgumentsSchema = ReturnType<typeof compileArguments>;

/**
 * Validates and normalises tool arguments. One strict zod object is compiled
 * per descriptor when the validator is built; validation itself is pure and
 * never throws on caller input.
 */
export class InputValidator {
  private readonly schemas = new Map<string, ArgumentsSchema>();

  constructor(
    descriptors: readonly ToolDescriptor[],
    private readonly limits: InputLimits,
  ) {
    for (const descriptor of descriptors) {
      this.schemas.set(descriptor.name, compileArguments(descriptor, limits));
    }
  }

  validate(descriptor: ToolDescriptor, args: unknown): ValidationOutcome {
    const schema = this.schemas.get(descriptor.name) ?? compileArguments(descriptor, this.limits);
    const parsed = schema.safeParse(args ?? {});
    if (parsed.success) {
      return { ok: true, value: Object.freeze({ ...parsed.data }) };
    }
    return { ok: false, issues: parsed.error.issues.flatMap(toFieldIssues) };
  }

  /**
   * Summarises raw arguments for the audit trail. Free text is reduced to its
   * length, lists to their size, and the dataset id is kept only when it
   * matches the configured pattern.
   */
  summarize(descriptor: ToolDescriptor, args: unknown): SanitizedArguments {
    const summary: Record<string, string | number | boolean> = {};
    if (typeof args !== "object" || args === null || Array.isArray(args)) {
      return summary;
    }
    const raw: Record<string, unknown> = { ...args };
    const known = new Set<string>();

    for (const spec of descriptor.arguments) {
      known.add(spec.name);
      const value = raw[spec.name];
      switch (spec.kind) {
        case "dataset_id":
          if (typeof value === "string") {
            const trimmed = value.trim();
            if (this.limits.datasetIdPattern.test(trimmed)) {
              summary[spec.name] = trimmed;
            } else {
              summary[`${spec.name}_length`] = characterCount(value);
            }
          }
          break;
        case "free_text":
        case "optional_text":
          if (typeof value === "string") {
            summary[`${spec.name}_length`] = characterCount(value);
          }
          break;
        case "text_list":
          if (Array.isArray(value)) {
            summary[`${spec.name}_count`] = value.length;
          }
          break;
        case "top_k":
        case "flag":
          if (typeof value === "number" || typeof value === "boolean") {
            summary[spec.name] = value;
          }
          break;
      }
    }

    const unknown = Object.keys(raw).filter((key) => !known.has(key)).length;
    if (unknown > 0) {
      summary.unknown_argument_count = unknown;
    }
    return summary;
  }
}

function fieldName(path: ReadonlyArray<string | number>): string {
  const [head, ...rest] = path;
  if (head === undefined) {
    return "arguments";
  }
  return `${String(head)}${rest.map((segment) => `[${String(segment)}]`).join("")}`;
}

function toFieldIssues(issue: z.ZodIssue): FieldIssue[] {
  switch (issue.code) {
    case z.ZodIssueCode.unrecognized_keys:
      return issue.keys.map((key) => ({
        field: key,
        constraint: "unknown_argument",
        message: `Unknown argument: ${key}`,
      }));
    case z.ZodIssueCode.invalid_type:
      return [{ field: fieldName(issue.path), constraint: "type", message: issue.message }];
    case z.ZodIssueCode.custom: {
      const constraint = issue.params?.constraint;
      return [
        {
          field: fieldName(issue.path),
          constraint: typeof constraint === "string" ? constraint : "invalid",
          message: issue.message,
        },
      ];
    }
    default:
      return [{ field: fieldName(issue.path), constraint: "invalid", message: issue.message }];
  }
}
