// src/config/qdrantCollections.ts

/**
 * Vector index namespace holding one point per catalog candidate
 * (payload: candidate_id). Resolved to a physical Qdrant collection and
 * embedding model through the vector_indexes table.
 */
export const CATALOG_INDEX_NAMESPACE = "catalog";
