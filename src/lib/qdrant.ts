import { z } from "zod";
import { UpstreamError } from "./errors";

const QDRANT_URL = process.env.QDRANT_URL ?? "http://localhost:6333";
const QDRANT_API_KEY = process.env.QDRANT_API_KEY ?? "";

export type QdrantFilter = {
  must?: Array<{ key: string; match: { value: string | number | boolean } }>;
};

export type QdrantSearchParams = {
  vector: number[];
  limit: number;
  with_payload?: boolean | string[];
  filter?: QdrantFilter;
};

const QdrantPointSchema = z.object({
  id: z.union([z.string(), z.number()]),
  score: z.number(),
  payload: z.record(z.unknown()).nullish(),
});

const QdrantSearchResponseSchema = z.object({
  result: z.array(QdrantPointSchema).optional(),
});

export type QdrantPoint = z.infer<typeof QdrantPointSchema>;

export const qdrantClient = {
  async search(
    collection: string,
    params: QdrantSearchParams,
    signal?: AbortSignal
  ): Promise<QdrantPoint[]> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (QDRANT_API_KEY) {
      headers["api-key"] = QDRANT_API_KEY;
    }

    let resp: Response;
    try {
      resp = await fetch(
        `${QDRANT_URL}/collections/${collection}/points/search`,
        {
          method: "POST",
          headers,
          body: JSON.stringify(params),
          signal,
        }
      );
    } catch (e) {
      throw new UpstreamError("vector-search", "Qdrant search request failed", {
        cause: e,
      });
    }

    if (!resp.ok) {
      const detail = await resp.text().catch(() => "");
      throw new UpstreamError(
        "vector-search",
        `Qdrant search failed: ${resp.status} ${resp.statusText} ${detail}`,
        { status: resp.status }
      );
    }

    const parsed = QdrantSearchResponseSchema.safeParse(await resp.json());
    if (!parsed.success) {
      throw new UpstreamError(
        "vector-search",
        "Qdrant search returned unexpected response shape",
        { status: resp.status }
      );
    }
    return parsed.data.result ?? [];
  },
};
