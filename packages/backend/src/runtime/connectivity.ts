import type { AbstractGraphStore } from "@graphqa/shared";
import { appConfig, type AppConfig } from "../config.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";

export type ServiceConnectionStatus = "ok" | "failed" | "not_configured";

type Neo4jSettings = Pick<AppConfig, "NEO4J_URI" | "NEO4J_USER" | "NEO4J_PASSWORD">;

type LlmSettings = Pick<
  AppConfig,
  "LLM_PROVIDER" | "OLLAMA_BASE_URL" | "OPENAI_API_KEY" | "GEMINI_API_KEY" | "QWEN_API_KEY"
>;

export function isNeo4jConfigured(settings: Neo4jSettings = appConfig): boolean {
  return [settings.NEO4J_URI, settings.NEO4J_USER, settings.NEO4J_PASSWORD].every(
    (value) => value.trim().length > 0
  );
}

/** Ollama needs only an endpoint; hosted providers need a key. */
export function isLlmConfigured(settings: LlmSettings = appConfig): boolean {
  const required = {
    ollama: settings.OLLAMA_BASE_URL,
    openai: settings.OPENAI_API_KEY,
    gemini: settings.GEMINI_API_KEY,
    qwen: settings.QWEN_API_KEY
  } satisfies Record<LlmSettings["LLM_PROVIDER"], string>;

  return required[settings.LLM_PROVIDER].trim().length > 0;
}

/**
 * Goes through the shared connect gate, so a cached startup failure reads as
 * "failed" here without another connection attempt.
 */
export async function checkNeo4jConnection(
  store: Pick<AbstractGraphStore, "healthCheck">,
  ensureStoreConnected: () => Promise<void>
): Promise<ServiceConnectionStatus> {
  try {
    await ensureStoreConnected();
    return (await store.healthCheck()) ? "ok" : "failed";
  } catch (error) {
    logger.warn({ err: error }, "Neo4j health check failed");
    return "failed";
  }
}

export async function checkLlmConnection(
  llmService: Pick<LLMServiceLike, "ping">
): Promise<ServiceConnectionStatus> {
  try {
    await llmService.ping();
    return "ok";
  } catch (error) {
    logger.warn({ err: error }, "Language model health check failed");
    return "failed";
  }
}
