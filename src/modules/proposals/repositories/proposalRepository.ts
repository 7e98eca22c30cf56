// src/modules/proposals/repositories/proposalRepository.ts
import pool from "../../../db";
import { throwIfCancelled } from "../../../lib/errors";
import type { ProposalRepository, ProposalResult } from "../types";
import { withPersistence } from "./pgErrors";

type RfpRow = {
  id: string;
  title: string | null;
  buyer: string | null;
  summary: string | null;
};

type ItemRow = {
  item_id: string;
  description: string;
  quantity: string | number;
  unit: string;
  attributes: unknown;
};

type TestRow = {
  test_name: string;
  description: string | null;
  required_standard: string | null;
  price: string | number | null;
};

async function loadRfp(rfpId: string, signal?: AbortSignal): Promise<unknown | null> {
  throwIfCancelled(signal);

  return withPersistence(`load rfp ${rfpId}`, async () => {
    const rfpRes = await pool.query<RfpRow>(
      `SELECT id, title, buyer, summary FROM rfps WHERE id = $1`,
      [rfpId]
    );
    const rfp = rfpRes.rows[0];
    if (!rfp) return null;

    const itemsRes = await pool.query<ItemRow>(
      `
      SELECT item_id, description, quantity, unit, attributes
      FROM rfp_items
      WHERE rfp_id = $1
      ORDER BY position ASC, item_id ASC
      `,
      [rfpId]
    );

    // Test requirements are priced from the test price table; an unpriced
    // test contributes nothing to the pool.
    const testsRes = await pool.query<TestRow>(
      `
      SELECT t.test_name, t.description, t.required_standard, p.price
      FROM rfp_test_requirements t
      LEFT JOIN test_prices p ON lower(p.test_name) = lower(t.test_name)
      WHERE t.rfp_id = $1
      ORDER BY t.test_name ASC
      `,
      [rfpId]
    );

    for (const t of testsRes.rows) {
      if (t.price === null) {
        console.warn("proposal-repo: no price for test", { rfp_id: rfpId, test_name: t.test_name });
      }
    }

    // Shape matches RfpSchema; validation happens in the orchestrator.
    return {
      id: rfp.id,
      title: rfp.title ?? "",
      buyer: rfp.buyer,
      summary: rfp.summary,
      items: itemsRes.rows.map((r) => ({
        id: r.item_id,
        description: r.description,
        quantity: Number(r.quantity),
        unit: r.unit,
        attributes: r.attributes ?? {},
      })),
      testRequirements: testsRes.rows.map((t) => ({
        name: t.test_name,
        description: t.description ?? undefined,
        standard: t.required_standard ?? undefined,
        price: t.price === null ? 0 : Number(t.price),
      })),
    };
  });
}

async function store(result: ProposalResult, signal?: AbortSignal): Promise<void> {
  throwIfCancelled(signal);

  await withPersistence(`store run ${result.runId}`, async () => {
    await pool.query(
      `
      INSERT INTO proposal_results
        (run_id, rfp_id, state, outcome, degraded, grand_total, narrative, result_json, finished_at)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      ON CONFLICT (run_id) DO UPDATE SET
        state = EXCLUDED.state,
        outcome = EXCLUDED.outcome,
        degraded = EXCLUDED.degraded,
        grand_total = EXCLUDED.grand_total,
        narrative = EXCLUDED.narrative,
        result_json = EXCLUDED.result_json,
        finished_at = EXCLUDED.finished_at
      `,
      [
        result.runId,
        result.rfpId,
        result.state,
        result.outcome,
        result.degraded,
        result.totals.grandTotal,
        result.narrative,
        JSON.stringify(result),
        result.finishedAt,
      ]
    );
  });
}

export const pgProposalRepository: ProposalRepository = { loadRfp, store };
