import { UpstreamError } from "../../../lib/errors";
import {
  makeCandidate,
  makeItem,
  silenceConsole,
  testMatchConfig,
  testRetry,
} from "../testHelpers";
import type { LanguageModelClient, MatchResult, VectorHit } from "../types";
import { CatalogArena } from "./catalogArena";
import { matchItem, matchItems, type SpecMatchDeps } from "./specMatch";

silenceConsole();

const item = makeItem("i-1", {
  voltage: { value: "11kV", tolerance: "numeric-percent" },
  insulation: { value: "XLPE", tolerance: "exact" },
});

const catalog = new CatalogArena([
  makeCandidate("c-b", { voltage: "11kV", insulation: "XLPE" }, 40),
  makeCandidate("c-a", { voltage: "11kV", insulation: "XLPE" }, 40),
  makeCandidate("c-c", { voltage: "11kV", insulation: "XLPE" }, 30),
  makeCandidate("c-near", { voltage: "12kV", insulation: "XLPE" }, 10),
  makeCandidate("c-half", { voltage: "11kV", insulation: "PVC" }, 10),
  makeCandidate("c-low", { voltage: "12kV", insulation: "PVC" }, 5),
]);

function hits(...ids: string[]): VectorHit[] {
  return ids.map((candidateId, i) => ({ candidateId, similarity: 0.9 - i * 0.1 }));
}

function makeDeps(found: VectorHit[], llm?: LanguageModelClient): SpecMatchDeps {
  return {
    embedder: { embed: jest.fn(async () => [0.1, 0.2]) },
    vectorSearch: { query: jest.fn(async () => found) },
    catalog,
    retry: testRetry,
    llm,
  };
}

function rankedIds(result: MatchResult) {
  return result.ranked.map((r) => r.candidateId);
}

describe("matchItem", () => {
  it("ranks ties by unit price and then candidate id", async () => {
    const result = await matchItem(item, testMatchConfig(), makeDeps(hits("c-b", "c-a", "c-c")));

    expect(result).toMatchObject({
      itemId: "i-1",
      status: "Matched",
      chosenCandidateId: "c-c",
      finalScore: 100,
      label: "Exact Match",
      annotations: [],
    });
    expect(rankedIds(result)).toEqual(["c-c", "c-a", "c-b"]);
  });

  it("does not depend on the order hits come back in", async () => {
    const a = await matchItem(item, testMatchConfig(), makeDeps(hits("c-b", "c-a", "c-c")));
    const b = await matchItem(item, testMatchConfig(), makeDeps(hits("c-c", "c-a", "c-b")));

    expect(rankedIds(b)).toEqual(rankedIds(a));
    expect(b.chosenCandidateId).toBe(a.chosenCandidateId);
  });

  it("embeds the description with the required attributes", async () => {
    const deps = makeDeps([]);
    await matchItem(item, testMatchConfig({ topK: 7 }), deps);

    expect(deps.embedder.embed).toHaveBeenCalledWith(
      "Item i-1 voltage: 11kV insulation: XLPE",
      expect.any(AbortSignal)
    );
    expect(deps.vectorSearch.query).toHaveBeenCalledWith([0.1, 0.2], 7, expect.any(AbortSignal));
  });

  it("leaves the item unmatched below the acceptance threshold", async () => {
    const result = await matchItem(item, testMatchConfig(), makeDeps(hits("c-low")));

    expect(result).toMatchObject({
      status: "Unmatched",
      reason: "BELOW_THRESHOLD",
      chosenCandidateId: null,
      finalScore: 40,
      label: "Weak Match",
    });
    expect(rankedIds(result)).toEqual(["c-low"]);
  });

  it("accepts a score equal to the threshold", async () => {
    const result = await matchItem(item, testMatchConfig(), makeDeps(hits("c-half")));

    expect(result).toMatchObject({
      status: "Matched",
      chosenCandidateId: "c-half",
      finalScore: 50,
      label: "Partial Match",
    });
  });

  it("reports no candidates with an empty comparison", async () => {
    const result = await matchItem(item, testMatchConfig(), makeDeps([]));

    expect(result).toMatchObject({
      status: "Unmatched",
      reason: "NO_CANDIDATES",
      finalScore: 0,
      label: "No Match",
    });
    expect(result.comparison).toEqual([
      { attribute: "voltage", requiredValue: "11kV", candidateValues: ["N/A", "N/A", "N/A"] },
      { attribute: "insulation", requiredValue: "XLPE", candidateValues: ["N/A", "N/A", "N/A"] },
    ]);
  });

  it("compares the top three candidates side by side", async () => {
    const result = await matchItem(
      item,
      testMatchConfig(),
      makeDeps(hits("c-low", "c-half", "c-near", "c-c"))
    );

    expect(rankedIds(result)).toEqual(["c-c", "c-near", "c-half", "c-low"]);
    expect(result.comparison).toEqual([
      { attribute: "voltage", requiredValue: "11kV", candidateValues: ["11kV", "12kV", "11kV"] },
      { attribute: "insulation", requiredValue: "XLPE", candidateValues: ["XLPE", "XLPE", "PVC"] },
    ]);
  });

  it("skips hits missing from the catalog and keeps the best duplicate", async () => {
    const result = await matchItem(
      item,
      testMatchConfig(),
      makeDeps([
        { candidateId: "ghost", similarity: 0.99 },
        { candidateId: "c-a", similarity: 0.5 },
        { candidateId: "c-a", similarity: 0.8 },
      ])
    );

    expect(result.ranked).toEqual([
      { candidateId: "c-a", score: 100, similarity: 0.8, unitPrice: 40 },
    ]);
  });

  it("marks the item upstream-unavailable once retries run out", async () => {
    const deps = makeDeps([]);
    deps.vectorSearch.query = jest.fn(async (): Promise<VectorHit[]> => {
      throw new UpstreamError("vector-search", "index down", { status: 503 });
    });

    const result = await matchItem(item, testMatchConfig(), deps);

    expect(result).toMatchObject({
      status: "Unmatched",
      reason: "UPSTREAM_UNAVAILABLE",
      annotations: ["UPSTREAM_UNAVAILABLE"],
      error: "index down",
    });
    expect(deps.vectorSearch.query).toHaveBeenCalledTimes(3);
  });

  it("does not retry a rejected request", async () => {
    const deps = makeDeps([]);
    deps.embedder.embed = jest.fn(async (): Promise<number[]> => {
      throw new UpstreamError("embedding", "bad input", { status: 400 });
    });

    const result = await matchItem(item, testMatchConfig(), deps);

    expect(result).toMatchObject({ status: "Unmatched", reason: "UPSTREAM_UNAVAILABLE" });
    expect(deps.embedder.embed).toHaveBeenCalledTimes(1);
  });
});

describe("matchItem with re-rank", () => {
  const rerankOn = testMatchConfig({ rerank: { enabled: true, topN: 3 } });

  function llmReturning(text: string) {
    return { complete: jest.fn(async () => text) };
  }

  function sentCandidateIds(llm: { complete: jest.Mock }) {
    const payload: { candidates: Array<{ id: string }> } = JSON.parse(
      llm.complete.mock.calls[0][0].user
    );
    return payload.candidates.map((c) => c.id);
  }

  it("lets the model reorder eligible candidates", async () => {
    const llm = llmReturning(JSON.stringify({ ranked_candidate_ids: ["c-a", "c-c"] }));
    const result = await matchItem(item, rerankOn, makeDeps(hits("c-b", "c-a", "c-c"), llm));

    expect(result).toMatchObject({
      status: "Matched",
      chosenCandidateId: "c-a",
      rerankedIds: ["c-a", "c-c", "c-b"],
      annotations: [],
    });
    expect(llm.complete).toHaveBeenCalledWith(
      expect.objectContaining({ temperature: 0 }),
      expect.any(AbortSignal)
    );
  });

  it("accepts fenced JSON", async () => {
    const llm = llmReturning('```json\n{"ranked_candidate_ids":["c-b"]}\n```');
    const result = await matchItem(item, rerankOn, makeDeps(hits("c-b", "c-a", "c-c"), llm));

    expect(result.chosenCandidateId).toBe("c-b");
  });

  it("only shows the model candidates at or above the threshold", async () => {
    const llm = llmReturning(JSON.stringify({ ranked_candidate_ids: ["c-low"] }));
    const result = await matchItem(
      item,
      rerankOn,
      makeDeps(hits("c-low", "c-a", "c-c"), llm)
    );

    expect(sentCandidateIds(llm)).toEqual(["c-c", "c-a"]);
    expect(result).toMatchObject({
      chosenCandidateId: "c-c",
      annotations: ["RERANK_DEGRADED"],
    });
    expect(result).not.toHaveProperty("rerankedIds");
  });

  it("limits the model to the top N eligible candidates", async () => {
    const llm = llmReturning(JSON.stringify({ ranked_candidate_ids: ["c-a"] }));
    await matchItem(
      item,
      testMatchConfig({ rerank: { enabled: true, topN: 2 } }),
      makeDeps(hits("c-b", "c-a", "c-c"), llm)
    );

    expect(sentCandidateIds(llm)).toEqual(["c-c", "c-a"]);
  });

  it("falls back to the deterministic winner on non-JSON output", async () => {
    const llm = llmReturning("I would pick c-a.");
    const result = await matchItem(item, rerankOn, makeDeps(hits("c-b", "c-a", "c-c"), llm));

    expect(result).toMatchObject({
      chosenCandidateId: "c-c",
      annotations: ["RERANK_DEGRADED"],
    });
  });

  it("falls back when the model keeps failing", async () => {
    const llm = {
      complete: jest.fn(async (): Promise<string> => {
        throw new UpstreamError("llm", "overloaded", { status: 529 });
      }),
    };
    const result = await matchItem(item, rerankOn, makeDeps(hits("c-b", "c-a", "c-c"), llm));

    expect(result).toMatchObject({
      status: "Matched",
      chosenCandidateId: "c-c",
      annotations: ["RERANK_DEGRADED"],
    });
    expect(llm.complete).toHaveBeenCalledTimes(3);
  });

  it("skips the model with fewer than two eligible candidates", async () => {
    const llm = llmReturning("{}");
    await matchItem(item, rerankOn, makeDeps(hits("c-c", "c-low"), llm));
    await matchItem(item, rerankOn, makeDeps(hits("c-low"), llm));

    expect(llm.complete).not.toHaveBeenCalled();
  });

  it("skips the model when re-rank is disabled", async () => {
    const llm = llmReturning("{}");
    await matchItem(item, testMatchConfig(), makeDeps(hits("c-b", "c-a", "c-c"), llm));

    expect(llm.complete).not.toHaveBeenCalled();
  });
});

describe("matchItems", () => {
  it("keeps item order and the concurrency limit", async () => {
    const items = ["i-1", "i-2", "i-3", "i-4", "i-5"].map((id) => makeItem(id, {}));
    let inFlight = 0;
    let maxInFlight = 0;

    const deps = makeDeps([]);
    deps.embedder.embed = jest.fn(async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return [1];
    });

    const results = await matchItems(items, testMatchConfig({ concurrency: 2 }), deps);

    expect(results.map((r) => r.itemId)).toEqual(["i-1", "i-2", "i-3", "i-4", "i-5"]);
    expect(maxInFlight).toBe(2);
  });
});
