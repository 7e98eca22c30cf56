import { Router } from "express";
import { randomUUID } from "crypto";
import type { PipelineErrorCode } from "../../../lib/errors";
import {
  orchestrateProposalRun,
  type ProposalRunDeps,
} from "../lib/orchestrateProposalRun";

export function httpStatusFor(code: PipelineErrorCode): number {
  switch (code) {
    case "NOT_FOUND":
      return 404;
    case "VALIDATION_ERROR":
      return 400;
    case "UPSTREAM_UNAVAILABLE":
      return 503;
    case "CANCELLED":
      return 499;
    case "INTERNAL_ERROR":
      return 500;
  }
}

export function createProcessRfpRouter(
  deps: ProposalRunDeps,
  startRun?: (runId: string, rfpId: string) => Promise<void>
) {
  const router = Router();

  /**
   * POST /rfps/:rfpId/proposal
   * Matches, prices and narrates the RFP in one synchronous run.
   * Closing the connection cancels the run.
   */
  router.post("/:rfpId/proposal", async (req, res) => {
    const { rfpId } = req.params;
    const runId = randomUUID();

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      if (startRun) await startRun(runId, rfpId);

      const response = await orchestrateProposalRun(
        { rfpId, runId, signal: controller.signal },
        deps
      );

      if (controller.signal.aborted) return;
      return res
        .status(response.ok ? 200 : httpStatusFor(response.code))
        .json(response);
    } catch (err) {
      console.error("proposal error:", err);
      return res
        .status(500)
        .json({ ok: false, code: "INTERNAL_ERROR", error: "Internal Server Error" });
    }
  });

  return router;
}
