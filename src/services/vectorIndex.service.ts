// src/services/vectorIndex.service.ts
import pool from "../db";

export type ActiveVectorIndex = {
  qdrant_collection: string;
  embedding_model_id: string;
  embedding_dim: number;
};

export async function getActiveVectorIndex(
  namespace: string
): Promise<ActiveVectorIndex | null> {
  const result = await pool.query<ActiveVectorIndex>(
    `
    SELECT
      qdrant_collection,
      embedding_model_id,
      embedding_dim
    FROM vector_indexes
    WHERE namespace = $1
      AND is_active = true
      AND status = 'ready'
    LIMIT 1
    `,
    [namespace]
  );

  return result.rows[0] ?? null;
}
