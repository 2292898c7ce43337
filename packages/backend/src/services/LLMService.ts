import OpenAI, { type ClientOptions } from "openai";
import { z } from "zod";
import type { ExtractedGraphDocument } from "@graphqa/shared";
import {
  ANSWER_SYSTEM_PROMPT,
  buildAnswerUserPrompt,
  buildCypherSystemPrompt,
  buildExtractionSystemPrompt,
  buildExtractionUserPrompt
} from "../prompts/index.js";
import { appConfig } from "../config.js";
import { LLMRateLimiter } from "./LLMRateLimiter.js";
import type {
  AnswerGenerationInput,
  ChatCompletionMessage,
  ChatCompletionUsage,
  CypherGenerationInput,
  LLMConfig,
  LLMServiceLike,
  OpenAICompatibleClient,
  TokenUsagePhase,
  TokenUsageRecord
} from "./llmTypes.js";

export const extractedGraphDocumentSchema = z.object({
  nodes: z.array(
    z.object({
      id: z.string().min(1),
      label: z.string().min(1)
    })
  ),
  edges: z
    .array(
      z.object({
        source_node_id: z.string().min(1),
        target_node_id: z.string().min(1),
        type: z.string().min(1)
      })
    )
    .default([])
});

type NormalizedLLMConfig = LLMConfig & {
  baseURL: string;
  extractionTemperature: number;
  answerTemperature: number;
  maxTokens: number;
  maxConcurrent: number;
  requestsPerMinute: number;
  timeoutMs: number;
};

export const MAX_USAGE_RECORDS = 200;

export class LLMService implements LLMServiceLike {
  private readonly client: OpenAICompatibleClient;
  private readonly rateLimiter: LLMRateLimiter;
  private readonly usageRecords: TokenUsageRecord[] = [];
  private readonly config: NormalizedLLMConfig;

  constructor(
    config: LLMConfig,
    deps?: {
      client?: OpenAICompatibleClient;
      rateLimiter?: LLMRateLimiter;
    }
  ) {
    this.config = {
      ...config,
      baseURL: config.baseURL ?? "http://localhost:11434/v1",
      extractionTemperature: config.extractionTemperature ?? 0,
      answerTemperature: config.answerTemperature ?? 0.3,
      maxTokens: config.maxTokens ?? 2048,
      maxConcurrent: config.maxConcurrent ?? 5,
      requestsPerMinute: config.requestsPerMinute ?? 60,
      timeoutMs: config.timeoutMs ?? 60_000
    };

    this.client = deps?.client ?? createOpenAIClient(this.config.apiKey, this.config.baseURL);

    this.rateLimiter =
      deps?.rateLimiter ??
      new LLMRateLimiter({
        maxConcurrent: this.config.maxConcurrent,
        requestsPerMinute: this.config.requestsPerMinute,
        timeoutMs: this.config.timeoutMs
      });
  }

  static fromEnv(): LLMService {
    const provider = appConfig.LLM_PROVIDER;

    const providerSettings = {
      ollama: {
        // Ollama ignores the key but the SDK refuses an empty one.
        apiKey: "ollama",
        baseURL: appConfig.OLLAMA_BASE_URL,
        chatModel: appConfig.OLLAMA_CHAT_MODEL
      },
      openai: {
        apiKey: appConfig.OPENAI_API_KEY,
        baseURL: appConfig.OPENAI_BASE_URL,
        chatModel: appConfig.OPENAI_CHAT_MODEL
      },
      gemini: {
        apiKey: appConfig.GEMINI_API_KEY,
        baseURL: appConfig.GEMINI_BASE_URL,
        chatModel: appConfig.GEMINI_CHAT_MODEL
      },
      qwen: {
        apiKey: appConfig.QWEN_API_KEY,
        baseURL: appConfig.QWEN_BASE_URL,
        chatModel: appConfig.QWEN_CHAT_MODEL
      }
    } satisfies Record<typeof provider, Pick<LLMConfig, "apiKey" | "baseURL" | "chatModel">>;

    return new LLMService({
      ...providerSettings[provider],
      extractionTemperature: appConfig.EXTRACTION_TEMPERATURE,
      answerTemperature: appConfig.ANSWER_TEMPERATURE,
      maxConcurrent: appConfig.LLM_MAX_CONCURRENT,
      requestsPerMinute: appConfig.LLM_REQUESTS_PER_MINUTE,
      timeoutMs: appConfig.LLM_TIMEOUT_MS
    });
  }

  async extractGraph(text: string, title: string): Promise<ExtractedGraphDocument> {
    const content = await this.complete("extraction", {
      temperature: this.config.extractionTemperature,
      json: true,
      messages: [
        { role: "system", content: buildExtractionSystemPrompt() },
        { role: "user", content: buildExtractionUserPrompt(text, title) }
      ]
    });

    return extractedGraphDocumentSchema.parse(safeJsonParse(content));
  }

  async generateCypher(input: CypherGenerationInput): Promise<string> {
    return this.complete("query", {
      temperature: 0,
      json: false,
      messages: [
        { role: "system", content: buildCypherSystemPrompt(input.schemaDescription) },
        { role: "user", content: input.question }
      ]
    });
  }

  async generateAnswer(input: AnswerGenerationInput): Promise<string> {
    const content = await this.complete("answer", {
      temperature: this.config.answerTemperature,
      json: false,
      messages: [
        { role: "system", content: ANSWER_SYSTEM_PROMPT },
        {
          role: "user",
          content: buildAnswerUserPrompt(input.question, input.cypherQuery, input.resultsText)
        }
      ]
    });
    return content.trim();
  }

  async ping(): Promise<void> {
    await this.rateLimiter.run(() =>
      this.client.chat.completions.create({
        model: this.config.chatModel,
        temperature: 0,
        max_tokens: 1,
        messages: [{ role: "user", content: "ping" }]
      })
    );
  }

  getUsageRecords(limit = MAX_USAGE_RECORDS): TokenUsageRecord[] {
    const safeLimit = Math.max(1, limit);
    return this.usageRecords.slice(-safeLimit);
  }

  clearUsageRecords(): void {
    this.usageRecords.length = 0;
  }

  private async complete(
    phase: TokenUsagePhase,
    options: { temperature: number; json: boolean; messages: ChatCompletionMessage[] }
  ): Promise<string> {
    const response = await this.rateLimiter.run(() =>
      this.client.chat.completions.create({
        model: this.config.chatModel,
        temperature: options.temperature,
        max_tokens: this.config.maxTokens,
        messages: options.messages,
        ...(options.json ? { response_format: { type: "json_object" as const } } : {})
      })
    );

    this.recordUsage(phase, response.usage ?? undefined);
    return response.choices?.[0]?.message?.content ?? "";
  }

  private recordUsage(phase: TokenUsagePhase, usage: ChatCompletionUsage | undefined): void {
    this.usageRecords.push({
      phase,
      model: this.config.chatModel,
      promptTokens: usage?.prompt_tokens ?? 0,
      completionTokens: usage?.completion_tokens ?? 0,
      timestamp: new Date()
    });
    if (this.usageRecords.length > MAX_USAGE_RECORDS) {
      this.usageRecords.splice(0, this.usageRecords.length - MAX_USAGE_RECORDS);
    }
  }
}

/** SDK-level retries are disabled: a failed call surfaces once. */
export function openAIClientOptions(apiKey: string, baseURL: string): ClientOptions {
  return { apiKey, baseURL, maxRetries: 0 };
}

function createOpenAIClient(apiKey: string, baseURL: string): OpenAICompatibleClient {
  const openai = new OpenAI(openAIClientOptions(apiKey, baseURL));
  return {
    chat: {
      completions: {
        create: (request) => openai.chat.completions.create({ ...request, stream: false })
      }
    }
  };
}

function safeJsonParse(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch {
    const match = input.match(/\{[\s\S]*\}/);
    if (!match) {
      return {};
    }
    try {
      return JSON.parse(match[0]);
    } catch {
      return {};
    }
  }
}
