import { z } from "zod";
import { UpstreamError } from "./errors";

const TEI_URL = process.env.TEI_URL ?? "http://localhost:8081";

// one input in, one vector out
const EmbedResponseSchema = z.array(z.array(z.number())).length(1);

export async function embedText(
  text: string,
  signal?: AbortSignal
): Promise<number[]> {
  const input = (text ?? "").trim();

  let resp: Response;
  try {
    resp = await fetch(`${TEI_URL}/embed`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ inputs: [input] }),
      signal,
    });
  } catch (e) {
    throw new UpstreamError("embedding", "TEI embed request failed", { cause: e });
  }

  if (!resp.ok) {
    const detail = await resp.text().catch(() => "");
    throw new UpstreamError(
      "embedding",
      `TEI embed failed: ${resp.status} ${resp.statusText} ${detail}`,
      { status: resp.status }
    );
  }

  const parsed = EmbedResponseSchema.safeParse(await resp.json());
  if (!parsed.success) {
    throw new UpstreamError(
      "embedding",
      "TEI embed returned unexpected response shape",
      { status: resp.status }
    );
  }

  return parsed.data[0];
}
