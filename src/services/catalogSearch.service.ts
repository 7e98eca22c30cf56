// src/services/catalogSearch.service.ts
// Embedding + vector-search collaborators for the spec-match engine,
// backed by TEI and Qdrant.

import { embedText } from "../lib/embeddings";
import { qdrantClient, type QdrantPoint } from "../lib/qdrant";
import type {
  EmbeddingClient,
  VectorHit,
  VectorSearchClient,
} from "../modules/proposals/types";
import type { ActiveVectorIndex } from "./vectorIndex.service";

export const teiEmbedder: EmbeddingClient = {
  embed: (text, signal) => embedText(text, signal),
};

function candidateIdOf(point: QdrantPoint) {
  const fromPayload = point.payload?.candidate_id;
  return typeof fromPayload === "string" || typeof fromPayload === "number"
    ? String(fromPayload)
    : String(point.id);
}

export function createQdrantCatalogSearch(
  index: ActiveVectorIndex
): VectorSearchClient {
  return {
    async query(vector, topK, signal): Promise<VectorHit[]> {
      if (vector.length !== index.embedding_dim) {
        throw new Error(
          `Embedding dimension mismatch for catalog index (expected ${index.embedding_dim}, got ${vector.length}, model_id=${index.embedding_model_id})`
        );
      }

      const points = await qdrantClient.search(
        index.qdrant_collection,
        { vector, limit: topK, with_payload: ["candidate_id"] },
        signal
      );

      return points.map((p) => ({
        candidateId: candidateIdOf(p),
        similarity: p.score,
      }));
    },
  };
}
