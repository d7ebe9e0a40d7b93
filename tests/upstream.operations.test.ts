import { describe, it } from "mocha";
import { expect } from "chai";

import { UpstreamError } from "../src/rpc/errors.js";
import { UpstreamClient } from "../src/upstream/client.js";
import { executeOperation, findGlossary } from "../src/upstream/operations.js";
import {
  createFetchStub,
  createJsonResponse,
  createTextResponse,
  type FetchRecorder,
  type FetchSequenceEntry,
} from "./helpers/fetchStub.js";

function createClient(sequence: FetchSequenceEntry[], recorder: FetchRecorder): UpstreamClient {
  return new UpstreamClient({
    baseUrl: "http://upstream.test",
    timeoutMs: 1_000,
    retry: { maxAttempts: 1, delayMs: 0, retryableStatus: { min: 500, max: 599 } },
    fetchImpl: createFetchStub(sequence, recorder),
  });
}

describe("upstream/operations", () => {
  it("lists glossaries with an optional name filter", async () => {
    const recorder: FetchRecorder = [];
    const client = createClient([createJsonResponse({ items: [], total: 0 })], recorder);

    const response = await executeOperation(client, { kind: "list_glossaries", name: "legal" });

    expect(recorder[0]?.url).to.equal("http://upstream.test/glossaries?name=legal");
    expect(response.payload).to.deep.equal({ items: [], total: 0 });
  });

  it("posts retrieval requests to the dataset endpoint", async () => {
    const recorder: FetchRecorder = [];
    const client = createClient([createTextResponse('{"chunks":[]}')], recorder);
    const body = {
      question: "tort",
      top_k: 8,
      similarity_threshold: 0.2,
      vector_similarity_weight: 0.3,
      keyword: false,
      highlight: true,
    };

    const response = await executeOperation(client, { kind: "retrieve", datasetId: "law:v2", body });

    expect(recorder[0]?.url).to.equal("http://upstream.test/glossaries/law%3Av2/retrieve");
    expect(recorder[0]?.method).to.equal("POST");
    expect(recorder[0]?.body).to.equal(JSON.stringify(body));
    expect(response.body).to.equal('{"chunks":[]}');
  });

  it("returns the direct glossary lookup when the endpoint exists", async () => {
    const recorder: FetchRecorder = [];
    const client = createClient([createTextResponse('{"id": "ds-1", "name": "Legal"}')], recorder);

    const response = await executeOperation(client, { kind: "get_glossary", datasetId: "ds-1" });

    expect(recorder).to.have.lengthOf(1);
    expect(response.body).to.equal('{"id": "ds-1", "name": "Legal"}');
  });

  it("falls back to the listing when the direct lookup is unavailable", async () => {
    const recorder: FetchRecorder = [];
    const client = createClient(
      [
        createJsonResponse({ detail: "Not Found" }, 404),
        createJsonResponse({ items: [{ id: "other" }, { dataset_id: "ds-1", name: "Legal" }], total: 2 }),
      ],
      recorder,
    );

    const response = await executeOperation(client, { kind: "get_glossary", datasetId: "ds-1" });

    expect(recorder.map((request) => request.url)).to.deep.equal([
      "http://upstream.test/glossaries/ds-1",
      "http://upstream.test/glossaries",
    ]);
    expect(response.status).to.equal(200);
    expect(response.payload).to.deep.equal({ dataset_id: "ds-1", name: "Legal" });
    expect(response.body).to.equal('{"dataset_id":"ds-1","name":"Legal"}');
    expect(response.attempts).to.equal(2);
  });

  it("reports a missing glossary as a 404 upstream error", async () => {
    const recorder: FetchRecorder = [];
    const client = createClient(
      [createJsonResponse({}, 405), createJsonResponse({ items: [{ id: "other" }], total: 1 })],
      recorder,
    );

    try {
      await executeOperation(client, { kind: "get_glossary", datasetId: "ds-1" });
      expect.fail("Expected the lookup to fail");
    } catch (error) {
      expect(error).to.be.instanceOf(UpstreamError);
      if (error instanceof UpstreamError) {
        expect(error.upstreamCode).to.equal("E-UPSTREAM-NOT-FOUND");
        expect(error.status).to.equal(404);
        expect(error.message).to.equal("Upstream request failed with status 404: Glossary ds-1 not found");
      }
    }
  });

  it("surfaces other direct lookup failures without falling back", async () => {
    const recorder: FetchRecorder = [];
    const client = createClient([createJsonResponse({ detail: "denied" }, 403)], recorder);

    try {
      await executeOperation(client, { kind: "get_glossary", datasetId: "ds-1" });
      expect.fail("Expected the lookup to fail");
    } catch (error) {
      expect(error).to.be.instanceOf(UpstreamError);
      if (error instanceof UpstreamError) {
        expect(error.status).to.equal(403);
      }
    }
    expect(recorder).to.have.lengthOf(1);
  });
});

describe("upstream/operations findGlossary", () => {
  it("matches on dataset_id or id and ignores malformed listings", () => {
    const listing = { items: ["noise", { id: "a" }, { dataset_id: "b", id: "ignored" }] };
    expect(findGlossary(listing, "a")).to.deep.equal({ id: "a" });
    expect(findGlossary(listing, "b")).to.deep.equal({ dataset_id: "b", id: "ignored" });
    expect(findGlossary(listing, "ignored")).to.equal(undefined);
    expect(findGlossary({ items: "nope" }, "a")).to.equal(undefined);
    expect(findGlossary(null, "a")).to.equal(undefined);
  });
});
