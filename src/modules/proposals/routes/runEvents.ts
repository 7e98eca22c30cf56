import { Router } from "express";
import { errorMessage } from "../../../lib/errors";
import { sleep, type Sleep } from "../../../lib/retry";
import { openEventStream, type EventStream } from "../../../lib/sse";
import { findRun, type RunRecord } from "../repositories/runProgress";

export type RunEventsDeps = {
  findRun: (runId: string) => Promise<RunRecord | null>;
  sleep: Sleep;
  now: () => number;
  pollIntervalMs: number;
  keepaliveMs: number;
};

/**
 * Polls a run and forwards each change as a `progress` event, then `done`
 * once it succeeded or failed. Stops when the client goes away.
 */
export async function streamRunEvents(
  stream: EventStream,
  runId: string,
  deps: RunEventsDeps
) {
  stream.send("connected", { ok: true, run_id: runId });

  let lastPayload = "";
  let lastPing = deps.now();

  while (!stream.isClosed()) {
    let run: RunRecord | null;
    try {
      run = await deps.findRun(runId);
    } catch (e) {
      stream.send("error", { ok: false, error: "SSE polling error", detail: errorMessage(e) });
      break;
    }

    if (!run) {
      stream.send("error", { ok: false, error: "Run not found" });
      break;
    }

    const payload = JSON.stringify(run);
    if (payload !== lastPayload) {
      lastPayload = payload;
      stream.send("progress", run);
    }

    if (run.status === "succeeded" || run.status === "failed") {
      stream.send("done", run);
      break;
    }

    const now = deps.now();
    if (now - lastPing >= deps.keepaliveMs) {
      stream.ping();
      lastPing = now;
    }

    await deps.sleep(deps.pollIntervalMs);
  }

  stream.close();
}

const router = Router();

// GET /proposals/runs/:runId/events
router.get("/runs/:runId/events", async (req, res) => {
  const runId = String(req.params.runId || "").trim();

  await streamRunEvents(openEventStream(res), runId, {
    findRun,
    sleep,
    now: Date.now,
    pollIntervalMs: 600,
    keepaliveMs: 15000,
  });
});

export default router;
