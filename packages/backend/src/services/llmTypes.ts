import type { ExtractedGraphDocument } from "@graphqa/shared";

export interface LLMConfig {
  apiKey: string;
  baseURL?: string;
  chatModel: string;
  extractionTemperature?: number;
  answerTemperature?: number;
  maxTokens?: number;
  maxConcurrent?: number;
  requestsPerMinute?: number;
  timeoutMs?: number;
}

export interface LLMRateLimitConfig {
  maxConcurrent: number;
  requestsPerMinute: number;
  timeoutMs: number;
}

export type TokenUsagePhase = "extraction" | "query" | "answer";

export interface TokenUsageRecord {
  phase: TokenUsagePhase;
  model: string;
  promptTokens: number;
  completionTokens: number;
  timestamp: Date;
}

export interface ChatCompletionMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  temperature: number;
  max_tokens: number;
  messages: ChatCompletionMessage[];
  response_format?: { type: "json_object" };
}

export interface ChatCompletionUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
}

export interface ChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
  usage?: ChatCompletionUsage | null;
}

export interface OpenAICompatibleClient {
  chat: {
    completions: {
      create: (request: ChatCompletionRequest) => Promise<ChatCompletionResponse>;
    };
  };
}

export interface CypherGenerationInput {
  question: string;
  schemaDescription: string;
}

export interface AnswerGenerationInput {
  question: string;
  cypherQuery: string;
  resultsText: string;
}

export interface LLMServiceLike {
  /** Structured generation; throws when the response does not match the node/edge schema. */
  extractGraph(text: string, title: string): Promise<ExtractedGraphDocument>;
  /** Raw model output, cleaning is left to the caller. */
  generateCypher(input: CypherGenerationInput): Promise<string>;
  generateAnswer(input: AnswerGenerationInput): Promise<string>;
  ping(): Promise<void>;
}
