import express from "express";
import cors from "cors";
import dotenv from "dotenv";
import { loadPipelineConfig } from "./config/pipeline";
import { CATALOG_INDEX_NAMESPACE } from "./config/qdrantCollections";
import { createOpenAILanguageModel } from "./lib/openaiClient";
import type { ProposalRunDeps } from "./modules/proposals/lib/orchestrateProposalRun";
import { loadCatalogCandidates } from "./modules/proposals/repositories/catalogRepository";
import { pgProposalRepository } from "./modules/proposals/repositories/proposalRepository";
import {
  createRun,
  pgRunProgressSink,
} from "./modules/proposals/repositories/runProgress";
import { createProcessRfpRouter } from "./modules/proposals/routes/processRfp";
import proposalRunEventsRoutes from "./modules/proposals/routes/runEvents";
import { ReloadableCatalog } from "./modules/proposals/services/catalogArena";
import {
  createQdrantCatalogSearch,
  teiEmbedder,
} from "./services/catalogSearch.service";
import { getActiveVectorIndex } from "./services/vectorIndex.service";

dotenv.config();

async function main() {
  const config = loadPipelineConfig();

  const index = await getActiveVectorIndex(CATALOG_INDEX_NAMESPACE);
  if (!index) {
    throw new Error(
      `No active vector index for namespace: ${CATALOG_INDEX_NAMESPACE}`
    );
  }

  const catalog = new ReloadableCatalog(loadCatalogCandidates);
  await catalog.reload();

  if (!process.env.PROPOSAL_OPEN_AI_KEY) {
    console.warn(
      "PROPOSAL_OPEN_AI_KEY not set: re-ranking and narratives will be skipped"
    );
  }

  const deps: ProposalRunDeps = {
    repository: pgProposalRepository,
    embedder: teiEmbedder,
    vectorSearch: createQdrantCatalogSearch(index),
    catalog,
    llm: process.env.PROPOSAL_OPEN_AI_KEY
      ? createOpenAILanguageModel()
      : undefined,
    progress: pgRunProgressSink,
    config,
  };

  const app = express();
  app.use(cors());
  app.use(express.json());

  // Mount module routers
  app.use("/rfps", createProcessRfpRouter(deps, createRun)); // /rfps/:id/proposal
  app.use("/proposals", proposalRunEventsRoutes); // /proposals/runs/:id/events

  app.post("/catalog/reload", async (_req, res) => {
    try {
      const size = await catalog.reload();
      return res.json({ ok: true, candidates: size });
    } catch (err) {
      console.error("catalog reload error:", err);
      return res.status(503).json({ ok: false, error: "Catalog unavailable" });
    }
  });

  // Health
  app.get("/health", (_req, res) => {
    res.json({ ok: true, catalog_size: catalog.size });
  });

  const port = Number(process.env.PORT ?? 3001);
  app.listen(port, () => {
    console.log(`API listening on http://localhost:${port}`);
  });
}

main().catch((err) => {
  console.error("API failed to start:", err);
  process.exit(1);
});
