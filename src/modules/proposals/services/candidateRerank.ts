import { z } from "zod";
import { RunCancelledError, errorMessage } from "../../../lib/errors";
import { withRetry, type RetryPolicy } from "../../../lib/retry";
import { RERANK_PROMPT_V1 } from "../prompts/rerank_v1";
import type {
  CatalogClient,
  LanguageModelClient,
  RankedCandidate,
  RequestItem,
} from "../types";

export type RerankOutcome =
  | { kind: "success"; order: string[] }
  | { kind: "degraded"; reason: string };

const RerankResponseSchema = z.object({
  ranked_candidate_ids: z.array(z.coerce.string()),
  reasons: z.array(z.string()).optional(),
});

function stripCodeFence(text: string) {
  const t = text.trim();
  const m = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(t);
  return m ? m[1] : t;
}

function safeParseJson(text: string): unknown {
  try {
    return JSON.parse(stripCodeFence(text));
  } catch {
    return null;
  }
}

/**
 * Asks the language model to order already-eligible candidates.
 * Only ids from `eligible` can come back; ones the model left out are
 * appended in their deterministic order.
 */
export async function rerankCandidates(
  params: {
    item: RequestItem;
    eligible: RankedCandidate[];
    catalog: CatalogClient;
  },
  deps: { llm: LanguageModelClient; retry: RetryPolicy },
  signal?: AbortSignal
): Promise<RerankOutcome> {
  const { item, eligible, catalog } = params;

  const userPayload = {
    item: {
      id: item.id,
      description: item.description,
      quantity: item.quantity,
      unit: item.unit,
      required_attributes: item.attributes,
    },
    candidates: eligible.map((r) => {
      const c = catalog.getCandidate(r.candidateId);
      return {
        id: r.candidateId,
        name: c?.name ?? "",
        attributes: c?.attributes ?? {},
        unit_price: r.unitPrice,
        spec_match_score: r.score,
      };
    }),
  };

  let raw: string;
  try {
    raw = await withRetry(
      { service: "llm", label: `rerank item ${item.id}` },
      (s) =>
        deps.llm.complete(
          {
            system: RERANK_PROMPT_V1,
            user: JSON.stringify(userPayload),
            temperature: 0,
          },
          s
        ),
      deps.retry,
      signal
    );
  } catch (err) {
    if (err instanceof RunCancelledError) throw err;
    return { kind: "degraded", reason: errorMessage(err) };
  }

  const parsed = RerankResponseSchema.safeParse(safeParseJson(raw));
  if (!parsed.success) {
    return { kind: "degraded", reason: "Re-rank returned non-JSON output." };
  }

  // Enforce "IDs must come from the eligible candidates"
  const allowed = new Set(eligible.map((r) => r.candidateId));
  const order: string[] = [];
  for (const id of parsed.data.ranked_candidate_ids) {
    if (allowed.has(id) && !order.includes(id)) order.push(id);
  }

  if (order.length === 0) {
    return {
      kind: "degraded",
      reason: "Re-rank returned no eligible candidate ids.",
    };
  }

  for (const r of eligible) {
    if (!order.includes(r.candidateId)) order.push(r.candidateId);
  }

  return { kind: "success", order };
}
