import { UpstreamError } from "../rpc/errors.js";
import type { UpstreamCallOptions, UpstreamClient, UpstreamResponse } from "./client.js";

/** JSON body accepted by the upstream `/glossaries/{id}/retrieve` endpoint. */
export interface RetrievalRequestBody {
  readonly question: string;
  readonly top_k: number;
  readonly similarity_threshold: number;
  readonly vector_similarity_weight: number;
  readonly keyword: boolean;
  readonly highlight: boolean;
}

/** Read-only operations the gateway knows how to forward upstream. */
export type UpstreamOperation =
  | { readonly kind: "list_glossaries"; readonly name?: string }
  | { readonly kind: "get_glossary"; readonly datasetId: string }
  | { readonly kind: "retrieve"; readonly datasetId: string; readonly body: RetrievalRequestBody };

/** Direct lookup statuses that trigger the listing fallback of `get_glossary`. */
export const GLOSSARY_FALLBACK_STATUSES: readonly number[] = [404, 405, 501];

function glossaryPath(datasetId: string): string {
  return `/glossaries/${encodeURIComponent(datasetId)}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Finds the listing entry whose `dataset_id` (or `id`) equals {@link datasetId}. */
export function findGlossary(listing: unknown, datasetId: string): Record<string, unknown> | undefined {
  if (!isRecord(listing) || !Array.isArray(listing.items)) {
    return undefined;
  }
  for (const item of listing.items) {
    if (!isRecord(item)) {
      continue;
    }
    const identifier = item.dataset_id || item.id;
    if (identifier === datasetId) {
      return item;
    }
  }
  return undefined;
}

async function getGlossary(
  client: UpstreamClient,
  datasetId: string,
  options: UpstreamCallOptions,
): Promise<UpstreamResponse> {
  const direct = await client.call(
    { method: "GET", path: glossaryPath(datasetId), tolerateStatuses: GLOSSARY_FALLBACK_STATUSES },
    options,
  );
  if (!GLOSSARY_FALLBACK_STATUSES.includes(direct.status)) {
    return direct;
  }

  const listing = await client.call({ method: "GET", path: "/glossaries" }, options);
  const attempts = direct.attempts + listing.attempts;
  const item = findGlossary(listing.payload, datasetId);
  if (!item) {
    throw new UpstreamError(`Upstream request failed with status 404: Glossary ${datasetId} not found`, {
      upstreamCode: "E-UPSTREAM-NOT-FOUND",
      status: 404,
      attempts,
    });
  }
  return { status: listing.status, payload: item, body: JSON.stringify(item), attempts };
}

/** Maps an operation onto one or more upstream calls. */
export async function executeOperation(
  client: UpstreamClient,
  operation: UpstreamOperation,
  options: UpstreamCallOptions = {},
): Promise<UpstreamResponse> {
  switch (operation.kind) {
    case "list_glossaries":
      return client.call(
        {
          method: "GET",
          path: "/glossaries",
          ...(operation.name !== undefined ? { query: { name: operation.name } } : {}),
        },
        options,
      );
    case "get_glossary":
      return getGlossary(client, operation.datasetId, options);
    case "retrieve":
      return client.call(
        { method: "POST", path: `${glossaryPath(operation.datasetId)}/retrieve`, body: operation.body },
        options,
      );
  }
}
