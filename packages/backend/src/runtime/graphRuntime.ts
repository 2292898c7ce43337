import type { AbstractGraphStore } from "@graphqa/shared";
import { appConfig } from "../config.js";
import { ExtractionEngine } from "../pipeline/ExtractionEngine.js";
import { GraphMerger } from "../pipeline/GraphMerger.js";
import { IngestionPipeline } from "../pipeline/IngestionPipeline.js";
import { AnswerSynthesizer } from "../services/AnswerSynthesizer.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import { LLMService } from "../services/LLMService.js";
import { QueryExecutor } from "../services/QueryExecutor.js";
import { QuerySynthesizer } from "../services/QuerySynthesizer.js";
import { QuestionAnsweringService } from "../services/QuestionAnsweringService.js";
import { SchemaCache } from "../services/SchemaCache.js";
import { Neo4jGraphStore } from "../store/Neo4jGraphStore.js";

let graphStoreSingleton: AbstractGraphStore | null = null;
let llmServiceSingleton: LLMServiceLike | null = null;
let schemaCacheSingleton: SchemaCache | null = null;
let questionAnsweringSingleton: QuestionAnsweringService | null = null;
let ingestionPipelineSingleton: IngestionPipeline | null = null;

export function getGraphStoreSingleton(): AbstractGraphStore {
  if (!graphStoreSingleton) {
    graphStoreSingleton = Neo4jGraphStore.fromEnv();
  }

  return graphStoreSingleton;
}

export function getLLMServiceSingleton(): LLMServiceLike {
  if (!llmServiceSingleton) {
    llmServiceSingleton = LLMService.fromEnv();
  }

  return llmServiceSingleton;
}

export function getSchemaCacheSingleton(): SchemaCache {
  if (!schemaCacheSingleton) {
    schemaCacheSingleton = new SchemaCache(getGraphStoreSingleton(), {
      ttlMs: appConfig.SCHEMA_CACHE_TTL_MS,
      sampleLimit: appConfig.SCHEMA_SAMPLE_LIMIT
    });
  }

  return schemaCacheSingleton;
}

export function getQuestionAnsweringSingleton(): QuestionAnsweringService {
  if (!questionAnsweringSingleton) {
    const llmService = getLLMServiceSingleton();
    questionAnsweringSingleton = new QuestionAnsweringService(
      new QuerySynthesizer(getSchemaCacheSingleton(), llmService),
      new QueryExecutor(getGraphStoreSingleton()),
      new AnswerSynthesizer(llmService)
    );
  }

  return questionAnsweringSingleton;
}

export function getIngestionPipelineSingleton(): IngestionPipeline {
  if (!ingestionPipelineSingleton) {
    ingestionPipelineSingleton = new IngestionPipeline(
      new ExtractionEngine(getLLMServiceSingleton()),
      new GraphMerger(getGraphStoreSingleton())
    );
  }

  return ingestionPipelineSingleton;
}

/**
 * Wraps a connect call so it runs at most once. A failure stays cached:
 * later callers receive the same rejection instead of reconnecting.
 */
export function connectOnce(connect: () => Promise<void>): () => Promise<void> {
  let attempt: Promise<void> | null = null;
  return () => {
    if (!attempt) {
      attempt = connect();
    }
    return attempt;
  };
}

let connectSingleton: (() => Promise<void>) | null = null;

export function ensureGraphStoreConnected(): Promise<void> {
  if (!connectSingleton) {
    const store = getGraphStoreSingleton();
    connectSingleton = connectOnce(() => store.connect());
  }

  return connectSingleton();
}
