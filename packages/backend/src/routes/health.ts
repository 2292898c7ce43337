import { Router } from "express";
import type { AbstractGraphStore, HealthResponse } from "@graphqa/shared";
import {
  checkLlmConnection,
  checkNeo4jConnection,
  isLlmConfigured,
  isNeo4jConfigured,
  type ServiceConnectionStatus
} from "../runtime/connectivity.js";
import {
  ensureGraphStoreConnected,
  getGraphStoreSingleton,
  getLLMServiceSingleton,
  getSchemaCacheSingleton
} from "../runtime/graphRuntime.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import type { SchemaCache } from "../services/SchemaCache.js";

interface CreateHealthRouterOptions {
  store?: Pick<AbstractGraphStore, "healthCheck">;
  ensureStoreConnected?: () => Promise<void>;
  llmService?: Pick<LLMServiceLike, "ping">;
  schemaCache?: Pick<SchemaCache, "peek">;
  neo4jConfigured?: boolean;
  llmConfigured?: boolean;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions = {}): Router {
  const neo4jConfigured = options.neo4jConfigured ?? isNeo4jConfigured();
  const llmConfigured = options.llmConfigured ?? isLlmConfigured();
  const startTime = options.startTime ?? Date.now();

  const checkNeo4j = (): Promise<ServiceConnectionStatus> => {
    if (!neo4jConfigured) {
      return Promise.resolve("not_configured");
    }
    return checkNeo4jConnection(
      options.store ?? getGraphStoreSingleton(),
      options.ensureStoreConnected ?? (() => ensureGraphStoreConnected())
    );
  };

  const checkLlm = (): Promise<ServiceConnectionStatus> => {
    if (!llmConfigured) {
      return Promise.resolve("not_configured");
    }
    return checkLlmConnection(options.llmService ?? getLLMServiceSingleton());
  };

  const healthRouter = Router();

  healthRouter.get("/", async (_req, res) => {
    const [neo4j, llm] = await Promise.all([checkNeo4j(), checkLlm()]);
    const status: HealthResponse["status"] = neo4j === "ok" && llm !== "failed" ? "ok" : "degraded";

    const snapshot = (options.schemaCache ?? getSchemaCacheSingleton()).peek();
    const response: HealthResponse = {
      status,
      timestamp: new Date().toISOString(),
      uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
      checks: { neo4j, llm },
      schema: snapshot
        ? { version: snapshot.version, fetchedAt: new Date(snapshot.fetchedAt).toISOString() }
        : null
    };
    res.json(response);
  });

  return healthRouter;
}
