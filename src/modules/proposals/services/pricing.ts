// src/modules/proposals/services/pricing.ts
// Material cost per matched item plus a proportional share of the RFP's
// testing-cost pool. All arithmetic runs in integer cents.

import {
  AllocationInvariantError,
  PipelineError,
} from "../../../lib/errors";
import type {
  CatalogClient,
  MatchResult,
  PricingLine,
  PricingOutput,
  ProposalTotals,
  RequestItem,
  TestRequirement,
} from "../types";

const CURRENCY_EPSILON = 0.005;

export function toCents(amount: number) {
  return Math.round(amount * 100);
}

export function fromCents(cents: number) {
  return cents / 100;
}

function sum(values: readonly number[]) {
  return values.reduce((acc, v) => acc + v, 0);
}

export function computeTestCostPool(tests: readonly TestRequirement[]) {
  return fromCents(sum(tests.map((t) => toCents(t.price))));
}

/**
 * Splits `poolCents` across `weights` proportionally. Shares are floored and
 * the leftover cents (never negative) go to the heaviest weight (ties: lowest
 * key), so the shares always add up to the pool. Zero total weight allocates
 * nothing.
 */
export function allocateProportionally(
  poolCents: number,
  weights: readonly number[],
  keys: readonly string[]
): number[] {
  const total = sum(weights);
  if (poolCents === 0 || total <= 0) {
    return weights.map(() => 0);
  }

  const shares = weights.map((w) => Math.floor((poolCents * w) / total));
  const remainder = poolCents - sum(shares);

  if (remainder > 0) {
    let target = 0;
    for (let i = 1; i < weights.length; i++) {
      if (
        weights[i] > weights[target] ||
        (weights[i] === weights[target] && keys[i] < keys[target])
      ) {
        target = i;
      }
    }
    shares[target] += remainder;
  }

  return shares;
}

export function emptyTotals(currency: string): ProposalTotals {
  return {
    currency,
    totalMaterialCost: 0,
    testCostPool: 0,
    allocatedTestCost: 0,
    unallocatedTestCost: 0,
    grandTotal: 0,
  };
}

export function priceProposal(params: {
  items: readonly RequestItem[];
  matches: readonly MatchResult[];
  testCostPool: number;
  currency: string;
  catalog: CatalogClient;
}): PricingOutput {
  const { items, matches, catalog, currency } = params;
  const itemsById = new Map(items.map((i) => [i.id, i]));

  const drafts: Array<Omit<PricingLine, "allocatedTestCost" | "totalCost"> & {
    materialCents: number;
  }> = [];

  for (const match of matches) {
    if (match.status !== "Matched") continue;

    const item = itemsById.get(match.itemId);
    const candidate = catalog.getCandidate(match.chosenCandidateId);
    if (!item || !candidate) {
      throw new PipelineError(
        "INTERNAL_ERROR",
        `Cannot price item ${match.itemId}: ${
          item ? `candidate ${match.chosenCandidateId} not in catalog` : "unknown item"
        }`
      );
    }

    const materialCents = toCents(item.quantity * candidate.unitPrice);
    drafts.push({
      itemId: item.id,
      candidateId: candidate.id,
      quantity: item.quantity,
      unit: item.unit,
      unitPrice: candidate.unitPrice,
      materialCost: fromCents(materialCents),
      materialCents,
    });
  }

  const poolCents = toCents(params.testCostPool);
  const weights = drafts.map((d) => d.materialCents);
  const shares = allocateProportionally(
    poolCents,
    weights,
    drafts.map((d) => d.itemId)
  );

  const materialCents = sum(weights);
  const allocatedCents = sum(shares);

  if (materialCents > 0) {
    const allocated = fromCents(allocatedCents);
    const pool = fromCents(poolCents);
    if (
      Math.abs(allocated - pool) > CURRENCY_EPSILON ||
      shares.some((s) => s < 0)
    ) {
      throw new AllocationInvariantError(pool, allocated);
    }
  }

  const lines: PricingLine[] = drafts.map(
    ({ materialCents: m, ...line }, i) => ({
      ...line,
      allocatedTestCost: fromCents(shares[i]),
      totalCost: fromCents(m + shares[i]),
    })
  );

  return {
    lines,
    totals: {
      currency,
      totalMaterialCost: fromCents(materialCents),
      testCostPool: fromCents(poolCents),
      allocatedTestCost: fromCents(allocatedCents),
      unallocatedTestCost: fromCents(poolCents - allocatedCents),
      grandTotal: fromCents(materialCents + poolCents),
    },
  };
}
