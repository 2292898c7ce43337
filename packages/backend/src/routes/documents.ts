import type { Response } from "express";
import { Router } from "express";
import { z } from "zod";
import type {
  IngestDocumentsRequest,
  IngestDocumentsResponse,
  SeedResponse
} from "@graphqa/shared";
import { validate } from "../middleware/validator.js";
import type { IngestionPipeline } from "../pipeline/IngestionPipeline.js";
import { loadKnownEntities } from "../pipeline/knownEntities.js";
import type { KnownEntity } from "../pipeline/types.js";
import {
  ensureGraphStoreConnected,
  getIngestionPipelineSingleton,
  getSchemaCacheSingleton
} from "../runtime/graphRuntime.js";
import type { SchemaCache } from "../services/SchemaCache.js";
import { logger } from "../utils/logger.js";

const ingestBodySchema: z.ZodType<IngestDocumentsRequest, z.ZodTypeDef, unknown> = z.object({
  documents: z
    .array(
      z.object({
        filename: z.string().trim().min(1),
        title: z.string().default(""),
        text: z.string()
      })
    )
    .min(1)
    .max(100)
});

interface CreateDocumentsRouterOptions {
  pipeline?: Pick<IngestionPipeline, "ingestMany" | "seedKnownEntities">;
  schemaCache?: Pick<SchemaCache, "invalidate">;
  ensureStoreConnected?: () => Promise<void>;
  loadEntities?: () => Promise<KnownEntity[]>;
}

export function createDocumentsRouter(options: CreateDocumentsRouterOptions = {}): Router {
  const ensureStoreConnected = options.ensureStoreConnected ?? (() => ensureGraphStoreConnected());
  const getPipeline = () => options.pipeline ?? getIngestionPipelineSingleton();
  const getSchemaCache = () => options.schemaCache ?? getSchemaCacheSingleton();
  const loadEntities = options.loadEntities ?? (() => loadKnownEntities());
  const documentsRouter = Router();

  const ensureStoreReady = async (res: Response): Promise<boolean> => {
    try {
      await ensureStoreConnected();
      return true;
    } catch (error) {
      logger.error({ err: error }, "Graph store connection failed");
      res.status(503).json({ error: "Backend unavailable" });
      return false;
    }
  };

  documentsRouter.post("/", validate({ body: ingestBodySchema }), async (req, res, next) => {
    if (!(await ensureStoreReady(res))) {
      return;
    }

    const { documents } = ingestBodySchema.parse(req.body);
    try {
      const results = await getPipeline().ingestMany(documents);
      // A failed document may have merged part of its graph before failing.
      if (results.some((result) => result.status !== "skipped")) {
        getSchemaCache().invalidate();
      }
      const response: IngestDocumentsResponse = { results };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  documentsRouter.post("/seed", async (_req, res, next) => {
    if (!(await ensureStoreReady(res))) {
      return;
    }

    try {
      const entities = await loadEntities();
      const stats = await getPipeline().seedKnownEntities(entities);
      getSchemaCache().invalidate();
      const response: SeedResponse = { stats };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  return documentsRouter;
}
