import OpenAI, { APIConnectionError, APIError } from "openai";
import { UpstreamError } from "./errors";
import type { LanguageModelClient, LlmPrompt } from "../modules/proposals/types";

export function getOpenAIClient() {
  const key = process.env.PROPOSAL_OPEN_AI_KEY;
  if (!key) {
    throw new Error("Missing env var PROPOSAL_OPEN_AI_KEY");
  }
  // retries are handled by the pipeline's retry policy
  return new OpenAI({ apiKey: key, maxRetries: 0 });
}

function toUpstreamError(e: unknown): unknown {
  if (e instanceof APIConnectionError) {
    return new UpstreamError("llm", `OpenAI connection failed: ${e.message}`, { cause: e });
  }
  if (e instanceof APIError) {
    return new UpstreamError("llm", `OpenAI request failed: ${e.message}`, {
      status: e.status,
      cause: e,
    });
  }
  return e;
}

/** Chat-completions backed language model. */
export function createOpenAILanguageModel(
  openai: OpenAI = getOpenAIClient(),
  model = process.env.PROPOSAL_OPEN_AI_MODEL || "gpt-4o-mini"
): LanguageModelClient {
  return {
    async complete(prompt: LlmPrompt, signal?: AbortSignal) {
      try {
        const completion = await openai.chat.completions.create(
          {
            model,
            temperature: prompt.temperature ?? 0,
            messages: [
              { role: "system", content: prompt.system },
              { role: "user", content: prompt.user },
            ],
          },
          { signal }
        );
        return completion.choices?.[0]?.message?.content ?? "";
      } catch (e) {
        throw toUpstreamError(e);
      }
    },
  };
}
