// src/modules/proposals/repositories/runProgress.ts
// Writes progress updates to:
// - proposal_runs (history/system-of-record)
// - rfps.proposal_* (current UI snapshot)

import pool from "../../../db";
import type { RunProgress, RunProgressSink } from "../types";

export type RunStatus = "running" | "succeeded" | "failed";

export type RunRecord = {
  id: string;
  rfp_id: string;
  status: RunStatus;
  state: RunProgress["state"];
  progress: number;
  message: string | null;
  error: string | null;
  updated_at: string;
};

function statusOf(state: RunProgress["state"]): RunStatus {
  if (state === "Complete") return "succeeded";
  if (state === "Failed") return "failed";
  return "running";
}

export async function createRun(runId: string, rfpId: string) {
  await pool.query(
    `
    INSERT INTO proposal_runs (id, rfp_id, status, state, progress, message)
    VALUES ($1, $2, 'running', 'Loaded', 0, 'Queued.')
    `,
    [runId, rfpId]
  );
}

export async function findRun(runId: string): Promise<RunRecord | null> {
  const { rows } = await pool.query<RunRecord>(
    `
    SELECT id, rfp_id, status, state, progress, message, error, updated_at
    FROM proposal_runs
    WHERE id = $1
    `,
    [runId]
  );
  return rows[0] ?? null;
}

async function report(runId: string, rfpId: string, patch: RunProgress) {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");

    await client.query(
      `
      UPDATE proposal_runs
      SET
        status = $2,
        state = $3,
        progress = $4,
        message = $5,
        error = $6,
        updated_at = now()
      WHERE id = $1
      `,
      [runId, statusOf(patch.state), patch.state, patch.progress, patch.message, patch.error ?? null]
    );

    await client.query(
      `
      UPDATE rfps
      SET
        current_proposal_run_id = $2,
        proposal_state = $3,
        proposal_progress = $4,
        proposal_message = $5,
        proposal_error = $6
      WHERE id = $1
      `,
      [rfpId, runId, patch.state, patch.progress, patch.message, patch.error ?? null]
    );

    await client.query("COMMIT");
  } catch (e) {
    await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
      console.error("run-progress: rollback failed", rollbackErr);
    });
    throw e;
  } finally {
    client.release();
  }
}

export const pgRunProgressSink: RunProgressSink = { report };
