import { withRetry, type RetryPolicy } from "../../../lib/retry";
import type {
  Candidate,
  CatalogClient,
  EmbeddingClient,
  RequestItem,
  VectorSearchClient,
} from "../types";

export type RetrievedCandidate = {
  candidate: Candidate;
  similarity: number;
};

export type RetrievalDeps = {
  embedder: EmbeddingClient;
  vectorSearch: VectorSearchClient;
  catalog: CatalogClient;
  retry: RetryPolicy;
};

/** Description followed by "name: value" for every required attribute. */
export function buildItemQuery(item: RequestItem) {
  const parts = [item.description.trim()];
  for (const [name, attr] of Object.entries(item.attributes)) {
    parts.push(`${name}: ${attr.value}`);
  }
  return parts.join(" ");
}

/**
 * Embeds the item and pulls its top-K neighbours from the vector index,
 * resolving each hit against the catalog. Upstream failures propagate
 * once the retry policy gives up.
 */
export async function retrieveCandidates(
  item: RequestItem,
  topK: number,
  deps: RetrievalDeps,
  signal?: AbortSignal
): Promise<RetrievedCandidate[]> {
  const query = buildItemQuery(item);

  const vector = await withRetry(
    { service: "embedding", label: `embed item ${item.id}` },
    (s) => deps.embedder.embed(query, s),
    deps.retry,
    signal
  );

  const hits = await withRetry(
    { service: "vector-search", label: `vector search item ${item.id}` },
    (s) => deps.vectorSearch.query(vector, topK, s),
    deps.retry,
    signal
  );

  // De-dupe by candidate id, keep best similarity
  const best = new Map<string, RetrievedCandidate>();
  for (const hit of hits) {
    const candidate = deps.catalog.getCandidate(hit.candidateId);
    if (!candidate) {
      console.warn("retrieval: hit not in catalog, skipping", {
        item_id: item.id,
        candidate_id: hit.candidateId,
      });
      continue;
    }
    const existing = best.get(candidate.id);
    if (!existing || hit.similarity > existing.similarity) {
      best.set(candidate.id, { candidate, similarity: hit.similarity });
    }
  }

  return Array.from(best.values());
}
