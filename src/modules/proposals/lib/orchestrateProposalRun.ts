// src/modules/proposals/lib/orchestrateProposalRun.ts
// Runs one RFP through Loaded -> Matched -> Priced -> Synthesized -> Complete
// and reports progress along the way. Any state may end in Failed.

import { randomUUID } from "crypto";
import type { PipelineConfig } from "../../../config/pipeline";
import {
  NotFoundError,
  PipelineError,
  type PipelineErrorCode,
  RunCancelledError,
  ValidationError,
  errorMessage,
} from "../../../lib/errors";
import { withRetry } from "../../../lib/retry";
import { parseRfp } from "../schemas";
import { buildNarrativeRequest, synthesizeNarrative } from "../services/narrative";
import {
  computeTestCostPool,
  emptyTotals,
  priceProposal,
} from "../services/pricing";
import { matchItems } from "../services/specMatch";
import type {
  CatalogSource,
  EmbeddingClient,
  LanguageModelClient,
  MatchResult,
  PricingOutput,
  ProcessRfpResponse,
  ProposalRepository,
  ProposalResult,
  Rfp,
  RunProgress,
  RunProgressSink,
  RunStage,
  StageFailure,
  VectorSearchClient,
} from "../types";

export type ProposalRunDeps = {
  repository: ProposalRepository;
  embedder: EmbeddingClient;
  vectorSearch: VectorSearchClient;
  catalog: CatalogSource;
  llm?: LanguageModelClient;
  progress?: RunProgressSink;
  config: PipelineConfig;
  now?: () => Date;
};

type OrchestrateArgs = {
  rfpId: string;
  runId?: string;
  signal?: AbortSignal;
};

function codeOf(err: unknown): PipelineErrorCode {
  return err instanceof PipelineError ? err.code : "INTERNAL_ERROR";
}

export async function orchestrateProposalRun(
  { rfpId, runId = randomUUID(), signal }: OrchestrateArgs,
  deps: ProposalRunDeps
): Promise<ProcessRfpResponse> {
  const { config, repository } = deps;
  // one catalog for every stage of this run, whatever reloads meanwhile
  const catalog = deps.catalog.snapshot();
  const now = deps.now ?? (() => new Date());
  const startedAt = now().toISOString();
  const failures: StageFailure[] = [];

  async function setProgress(patch: RunProgress) {
    if (!deps.progress) return;
    try {
      await deps.progress.report(runId, rfpId, patch);
    } catch (e) {
      // progress is a UI snapshot; the run itself carries on
      console.warn("proposal-run: progress update failed", {
        run_id: runId,
        state: patch.state,
        error: errorMessage(e),
      });
    }
  }

  function resultOf(
    rfp: Rfp,
    fields: Partial<ProposalResult> & Pick<ProposalResult, "state">
  ): ProposalResult {
    const degraded = failures.length > 0;
    return {
      rfpId: rfp.id,
      runId,
      outcome: degraded ? "PARTIAL_FAILURE" : "OK",
      degraded,
      matches: [],
      pricing: [],
      totals: emptyTotals(config.currency),
      narrative: null,
      failures: [...failures],
      startedAt,
      finishedAt: now().toISOString(),
      ...fields,
    };
  }

  async function fail(
    stage: RunStage,
    err: unknown,
    result?: ProposalResult,
    persist = true
  ): Promise<ProcessRfpResponse> {
    const code = codeOf(err);
    const message = errorMessage(err);

    if (code === "INTERNAL_ERROR") {
      console.error("proposal-run: internal error", {
        run_id: runId,
        rfp_id: rfpId,
        stage,
        err,
      });
    } else {
      console.warn("proposal-run: failed", {
        run_id: runId,
        rfp_id: rfpId,
        stage,
        code,
        error: message,
      });
    }

    await setProgress({ state: "Failed", progress: 100, message: "Failed.", error: message });

    const response = {
      ok: false as const,
      code,
      error: message,
      ...(err instanceof ValidationError ? { issues: err.issues } : {}),
    };
    if (!result) return response;

    failures.push({ stage, code, message });
    const failed: ProposalResult = {
      ...result,
      state: "Failed",
      outcome: "PARTIAL_FAILURE",
      degraded: true,
      failures: [...failures],
    };

    if (persist) {
      try {
        // no run signal here: a cancelled run is still recorded as Failed
        await withRetry(
          { service: "persistence", label: `store failed run ${runId}` },
          (s) => repository.store(failed, s),
          config.retry
        );
      } catch (storeErr) {
        console.error("proposal-run: could not store failed run", {
          run_id: runId,
          error: errorMessage(storeErr),
        });
      }
    }

    return { ...response, result: failed };
  }

  // Loaded
  await setProgress({ state: "Loaded", progress: 1, message: "Loading RFP…", error: null });

  let rfp: Rfp;
  try {
    const raw = await withRetry(
      { service: "persistence", label: `load rfp ${rfpId}` },
      (s) => repository.loadRfp(rfpId, s),
      config.retry,
      signal
    );
    if (raw === null) {
      throw new NotFoundError(`RFP ${rfpId} not found`);
    }
    rfp = parseRfp(raw);
  } catch (err) {
    return fail("load", err);
  }

  await setProgress({
    state: "Loaded",
    progress: 10,
    message: `Matching ${rfp.items.length} items…`,
    error: null,
  });

  // Matched
  let matches: MatchResult[];
  try {
    matches = await matchItems(
      rfp.items,
      config.match,
      {
        embedder: deps.embedder,
        vectorSearch: deps.vectorSearch,
        catalog,
        llm: deps.llm,
        retry: config.retry,
      },
      signal
    );
  } catch (err) {
    // cancelled: in-flight item results are discarded
    return fail("match", err, resultOf(rfp, { state: "Failed" }));
  }

  for (const m of matches) {
    if (m.status === "Unmatched" && m.reason === "UPSTREAM_UNAVAILABLE") {
      failures.push({
        stage: "match",
        code: "UPSTREAM_UNAVAILABLE",
        message: m.error ?? "Candidate retrieval unavailable",
        itemId: m.itemId,
      });
    }
    if (m.annotations.includes("RERANK_DEGRADED")) {
      failures.push({
        stage: "match",
        code: "UPSTREAM_UNAVAILABLE",
        message: "Re-rank unavailable; deterministic ranking used",
        itemId: m.itemId,
      });
    }
  }

  const matchedCount = matches.filter((m) => m.status === "Matched").length;

  await setProgress({
    state: "Matched",
    progress: 50,
    message: `${matchedCount}/${matches.length} items matched.`,
    error: null,
  });

  // Priced
  let pricing: PricingOutput;
  try {
    pricing = priceProposal({
      items: rfp.items,
      matches,
      testCostPool: computeTestCostPool(rfp.testRequirements),
      currency: config.currency,
      catalog,
    });
  } catch (err) {
    return fail("price", err, resultOf(rfp, { state: "Failed", matches }));
  }

  await setProgress({
    state: "Priced",
    progress: 70,
    message: `Priced ${pricing.lines.length} lines.`,
    error: null,
  });

  // Synthesized
  let narrative: string | null;
  try {
    const outcome = await synthesizeNarrative(
      buildNarrativeRequest(rfp, matches, pricing, catalog),
      { llm: deps.llm, retry: config.retry },
      signal
    );
    narrative = outcome.narrative;
    if (outcome.kind === "degraded") {
      console.warn("proposal-run: narrative degraded", {
        run_id: runId,
        reason: outcome.reason,
      });
      failures.push({
        stage: "synthesize",
        code: "UPSTREAM_UNAVAILABLE",
        message: outcome.reason,
      });
    }
  } catch (err) {
    return fail("synthesize", err, resultOf(rfp, { state: "Failed", matches }));
  }

  await setProgress({
    state: "Synthesized",
    progress: 90,
    message: narrative ? "Narrative ready." : "Narrative unavailable.",
    error: null,
  });

  // Complete
  const result = resultOf(rfp, {
    state: "Complete",
    matches,
    pricing: pricing.lines,
    totals: pricing.totals,
    narrative,
  });

  try {
    await withRetry(
      { service: "persistence", label: `store run ${runId}` },
      (s) => repository.store(result, s),
      config.retry,
      signal
    );
  } catch (err) {
    if (err instanceof RunCancelledError) {
      return fail("store", err, resultOf(rfp, { state: "Failed", matches }));
    }
    return fail("store", err, result, false);
  }

  await setProgress({
    state: "Complete",
    progress: 100,
    message: result.degraded ? "Complete (degraded)." : "Complete.",
    error: null,
  });

  return { ok: true, code: result.outcome, result };
}
