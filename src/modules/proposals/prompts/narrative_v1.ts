import type { NarrativeRequest } from "../types";

export const NARRATIVE_SYSTEM_PROMPT_V1 = `
You write the executive summary of a supplier's response to a procurement request (RFP).

Rules:
- Use ONLY the figures and products in the summary provided. Do NOT invent specifications, prices or certifications.
- Write 2-3 short paragraphs of plain prose. No markdown, no bullet lists.
- Cover: how well the offered products match the requirements, the key technical highlights, and the total price.
- If some items could not be matched, say so plainly.
`.trim();

function formatAmount(amount: number, currency: string) {
  return `${currency} ${amount.toLocaleString("en-US", {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  })}`;
}

export function buildNarrativeUserPrompt(req: NarrativeRequest) {
  const matches = req.topMatches.length
    ? req.topMatches
        .map(
          (m) =>
            `- Item ${m.itemId}: ${m.candidateName} [${m.candidateId}] (SpecMatch ${m.score}%)`
        )
        .join("\n")
    : "- (none)";

  return (
    `RFP: ${req.title} [${req.rfpId}]\n` +
    `Buyer: ${req.buyer ?? "Unknown"}\n\n` +
    `Matched items: ${req.matchedItemCount}\n` +
    `Unmatched items: ${req.unmatchedItemCount}\n` +
    `Total cost: ${formatAmount(req.totalCost, req.currency)}\n\n` +
    `Top matches:\n` +
    matches
  );
}
