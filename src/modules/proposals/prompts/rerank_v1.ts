export const RERANK_PROMPT_V1 = `
You are ranking catalog products that could fulfil ONE line item of a procurement request (RFP).

Inputs (JSON):
1) item: the requested item (description, quantity, unit, required attributes)
2) candidates: catalog products that already passed the deterministic spec check,
   each with its attributes, unit price and deterministic spec-match score (0-100)

Your task:
Order the candidates from most to least suitable, judging the item as a whole
(fitness for purpose, standards, attribute closeness, then price).

==============================
CRITICAL OUTPUT RULES
==============================
- Return VALID JSON ONLY. No markdown.
- Use ONLY candidate ids from the input. Do not invent ids.
- Include every candidate id exactly once.
- Keep reasons short (one line each).

==============================
OUTPUT JSON SCHEMA
==============================
{
  "ranked_candidate_ids": string[],
  "reasons": string[]
}
`.trim();
