import { RunCancelledError, errorMessage } from "../../../lib/errors";
import { withRetry, type RetryPolicy } from "../../../lib/retry";
import {
  NARRATIVE_SYSTEM_PROMPT_V1,
  buildNarrativeUserPrompt,
} from "../prompts/narrative_v1";
import type {
  CatalogClient,
  LanguageModelClient,
  MatchResult,
  NarrativeOutcome,
  NarrativeRequest,
  PricingOutput,
  Rfp,
} from "../types";

const MAX_TOP_MATCHES = 5;

export function buildNarrativeRequest(
  rfp: Rfp,
  matches: readonly MatchResult[],
  pricing: PricingOutput,
  catalog: CatalogClient
): NarrativeRequest {
  const matched = matches.flatMap((m) => (m.status === "Matched" ? [m] : []));

  const topMatches = [...matched]
    .sort(
      (a, b) =>
        b.finalScore - a.finalScore ||
        (a.itemId < b.itemId ? -1 : a.itemId > b.itemId ? 1 : 0)
    )
    .slice(0, MAX_TOP_MATCHES)
    .map((m) => ({
      itemId: m.itemId,
      candidateId: m.chosenCandidateId,
      candidateName:
        catalog.getCandidate(m.chosenCandidateId)?.name ?? m.chosenCandidateId,
      score: m.finalScore,
    }));

  return {
    rfpId: rfp.id,
    title: rfp.title,
    buyer: rfp.buyer ?? null,
    matchedItemCount: matched.length,
    unmatchedItemCount: matches.length - matched.length,
    totalCost: pricing.totals.grandTotal,
    currency: pricing.totals.currency,
    topMatches,
  };
}

/**
 * Narrative generation never fails the run: any failure comes back as
 * `degraded` with a null narrative.
 */
export async function synthesizeNarrative(
  request: NarrativeRequest,
  deps: { llm?: LanguageModelClient; retry: RetryPolicy },
  signal?: AbortSignal
): Promise<NarrativeOutcome> {
  const { llm } = deps;
  if (!llm) {
    return { kind: "degraded", narrative: null, reason: "No language model configured" };
  }

  let text: string;
  try {
    text = await withRetry(
      { service: "llm", label: `narrative rfp ${request.rfpId}` },
      (s) =>
        llm.complete(
          {
            system: NARRATIVE_SYSTEM_PROMPT_V1,
            user: buildNarrativeUserPrompt(request),
            temperature: 0.7,
          },
          s
        ),
      deps.retry,
      signal
    );
  } catch (err) {
    if (err instanceof RunCancelledError) throw err;
    return { kind: "degraded", narrative: null, reason: errorMessage(err) };
  }

  const narrative = text.trim();
  if (!narrative) {
    return {
      kind: "degraded",
      narrative: null,
      reason: "Language model returned an empty narrative",
    };
  }
  return { kind: "success", narrative };
}
