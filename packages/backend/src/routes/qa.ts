import type { Response } from "express";
import { Router } from "express";
import { z } from "zod";
import type {
  AskRequest,
  AskResponse,
  ConnectResponse,
  SchemaResponse
} from "@graphqa/shared";
import { validate } from "../middleware/validator.js";
import {
  ensureGraphStoreConnected,
  getQuestionAnsweringSingleton,
  getSchemaCacheSingleton
} from "../runtime/graphRuntime.js";
import {
  InvalidQuestionError,
  type QuestionAnsweringService
} from "../services/QuestionAnsweringService.js";
import type { SchemaCache } from "../services/SchemaCache.js";
import { logger } from "../utils/logger.js";

const askBodySchema: z.ZodType<AskRequest, z.ZodTypeDef, unknown> = z.object({
  question: z.string().trim().min(1, "Question must be a non-empty string")
});

interface CreateQaRouterOptions {
  service?: Pick<QuestionAnsweringService, "answerQuestion">;
  schemaCache?: Pick<SchemaCache, "getSchema">;
  ensureStoreConnected?: () => Promise<void>;
}

export function createQaRouter(options: CreateQaRouterOptions = {}): Router {
  const ensureStoreConnected = options.ensureStoreConnected ?? (() => ensureGraphStoreConnected());
  const getService = () => options.service ?? getQuestionAnsweringSingleton();
  const getSchemaCache = () => options.schemaCache ?? getSchemaCacheSingleton();
  const qaRouter = Router();

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

  qaRouter.post("/connect", async (_req, res) => {
    try {
      await ensureStoreConnected();
      const response: ConnectResponse = {
        status: "success",
        message: "Connected to the knowledge graph"
      };
      res.json(response);
    } catch (error) {
      const response: ConnectResponse = {
        status: "error",
        message: error instanceof Error ? error.message : String(error)
      };
      res.status(500).json(response);
    }
  });

  qaRouter.post("/ask", validate({ body: askBodySchema }), async (req, res, next) => {
    if (!(await ensureStoreReady(res))) {
      return;
    }

    const { question } = askBodySchema.parse(req.body);
    try {
      const response: AskResponse = await getService().answerQuestion(question);
      res.json(response);
    } catch (error) {
      if (error instanceof InvalidQuestionError) {
        res.status(400).json({ error: error.message });
        return;
      }
      next(error);
    }
  });

  qaRouter.get("/schema", async (_req, res) => {
    if (!(await ensureStoreReady(res))) {
      return;
    }

    try {
      const response: SchemaResponse = await getSchemaCache().getSchema();
      res.json(response);
    } catch (error) {
      logger.error({ err: error }, "Schema summary unavailable");
      res.status(503).json({ error: "Schema unavailable" });
    }
  });

  return qaRouter;
}
