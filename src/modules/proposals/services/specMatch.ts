// src/modules/proposals/services/specMatch.ts
// Per-item candidate retrieval, deterministic scoring, optional re-rank and
// winner selection.

import type { MatchConfig } from "../../../config/pipeline";
import { mapWithConcurrency } from "../../../lib/concurrency";
import { RunCancelledError, errorMessage } from "../../../lib/errors";
import type {
  AttributeScore,
  LanguageModelClient,
  MatchAnnotation,
  MatchResult,
  RankedCandidate,
  RequestItem,
  SpecComparisonRow,
  UnmatchedReason,
} from "../types";
import { matchLabel, scoreCandidate } from "./attributeScoring";
import { rerankCandidates } from "./candidateRerank";
import {
  retrieveCandidates,
  type RetrievalDeps,
  type RetrievedCandidate,
} from "./candidateRetrieval";

export type SpecMatchDeps = RetrievalDeps & {
  llm?: LanguageModelClient;
};

export type ScoredCandidate = RankedCandidate & {
  breakdown: AttributeScore[];
};

function compareIds(a: string, b: string) {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Score desc, then unit price asc, then candidate id. */
export function compareScored(a: RankedCandidate, b: RankedCandidate) {
  return (
    b.score - a.score ||
    a.unitPrice - b.unitPrice ||
    compareIds(a.candidateId, b.candidateId)
  );
}

export function rankCandidates(
  item: RequestItem,
  retrieved: readonly RetrievedCandidate[],
  numericTolerancePercent: number
): ScoredCandidate[] {
  return retrieved
    .map(({ candidate, similarity }) => {
      const { score, breakdown } = scoreCandidate(
        item,
        candidate,
        numericTolerancePercent
      );
      return {
        candidateId: candidate.id,
        score,
        similarity,
        unitPrice: candidate.unitPrice,
        breakdown,
      };
    })
    .sort(compareScored);
}

export function buildComparison(
  item: RequestItem,
  top: readonly ScoredCandidate[]
): SpecComparisonRow[] {
  const valueAt = (slot: number, attribute: string) =>
    top[slot]?.breakdown.find((b) => b.attribute === attribute)
      ?.candidateValue ?? "N/A";

  return Object.entries(item.attributes).map(
    ([attribute, required]): SpecComparisonRow => ({
      attribute,
      requiredValue: String(required.value),
      candidateValues: [
        valueAt(0, attribute),
        valueAt(1, attribute),
        valueAt(2, attribute),
      ],
    })
  );
}

function toRanked(scored: ScoredCandidate): RankedCandidate {
  const { candidateId, score, similarity, unitPrice } = scored;
  return { candidateId, score, similarity, unitPrice };
}

function unmatched(
  itemId: string,
  scored: ScoredCandidate[],
  comparison: SpecComparisonRow[],
  reason: UnmatchedReason,
  error?: string
): MatchResult {
  const top = scored[0];
  const finalScore = top?.score ?? 0;
  const annotations: MatchAnnotation[] =
    reason === "UPSTREAM_UNAVAILABLE" ? ["UPSTREAM_UNAVAILABLE"] : [];
  return {
    itemId,
    status: "Unmatched",
    chosenCandidateId: null,
    ranked: scored.map(toRanked),
    finalScore,
    breakdown: top?.breakdown ?? [],
    label: matchLabel(finalScore),
    comparison,
    annotations,
    reason,
    ...(error ? { error } : {}),
  };
}

/**
 * Picks the winner among retrieved candidates. The re-ranker only ever
 * sees candidates at or above the acceptance threshold.
 */
export async function selectMatch(
  item: RequestItem,
  retrieved: readonly RetrievedCandidate[],
  config: MatchConfig,
  deps: Pick<SpecMatchDeps, "llm" | "catalog" | "retry">,
  signal?: AbortSignal
): Promise<MatchResult> {
  const scored = rankCandidates(item, retrieved, config.numericTolerancePercent);
  const comparison = buildComparison(item, scored.slice(0, 3));

  const top = scored[0];
  if (!top) {
    return unmatched(item.id, scored, comparison, "NO_CANDIDATES");
  }
  if (top.score < config.acceptanceThreshold) {
    return unmatched(item.id, scored, comparison, "BELOW_THRESHOLD");
  }

  let chosen = top;
  let rerankedIds: string[] | undefined;
  const annotations: MatchAnnotation[] = [];

  const eligible = scored
    .filter((s) => s.score >= config.acceptanceThreshold)
    .slice(0, config.rerank.topN);

  if (config.rerank.enabled && deps.llm && eligible.length >= 2) {
    const outcome = await rerankCandidates(
      { item, eligible: eligible.map(toRanked), catalog: deps.catalog },
      { llm: deps.llm, retry: deps.retry },
      signal
    );

    if (outcome.kind === "success") {
      rerankedIds = outcome.order;
      chosen = eligible.find((e) => e.candidateId === outcome.order[0]) ?? top;
    } else {
      annotations.push("RERANK_DEGRADED");
      console.warn("spec-match: rerank degraded, keeping deterministic order", {
        item_id: item.id,
        reason: outcome.reason,
      });
    }
  }

  return {
    itemId: item.id,
    status: "Matched",
    chosenCandidateId: chosen.candidateId,
    ranked: scored.map(toRanked),
    finalScore: chosen.score,
    breakdown: chosen.breakdown,
    label: matchLabel(chosen.score),
    comparison,
    annotations,
    ...(rerankedIds ? { rerankedIds } : {}),
  };
}

export async function matchItem(
  item: RequestItem,
  config: MatchConfig,
  deps: SpecMatchDeps,
  signal?: AbortSignal
): Promise<MatchResult> {
  let retrieved: RetrievedCandidate[];
  try {
    retrieved = await retrieveCandidates(item, config.topK, deps, signal);
  } catch (err) {
    if (err instanceof RunCancelledError) throw err;
    console.warn("spec-match: retrieval failed, item unmatched", {
      item_id: item.id,
      error: errorMessage(err),
    });
    return unmatched(
      item.id,
      [],
      buildComparison(item, []),
      "UPSTREAM_UNAVAILABLE",
      errorMessage(err)
    );
  }

  return selectMatch(item, retrieved, config, deps, signal);
}

/**
 * Matches every item with at most `config.concurrency` in flight.
 * Results come back in item order.
 */
export function matchItems(
  items: readonly RequestItem[],
  config: MatchConfig,
  deps: SpecMatchDeps,
  signal?: AbortSignal
): Promise<MatchResult[]> {
  return mapWithConcurrency(
    items,
    config.concurrency,
    (item) => matchItem(item, config, deps, signal),
    signal
  );
}
