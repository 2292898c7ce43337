import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5001),
  CORS_ORIGIN: z.string().default("*"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  INGEST_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LLM_PROVIDER: z.enum(["ollama", "openai", "gemini", "qwen"]).default("ollama"),
  OLLAMA_BASE_URL: z.string().default("http://localhost:11434/v1"),
  OLLAMA_CHAT_MODEL: z.string().default("llama3"),
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  GEMINI_API_KEY: z.string().default(""),
  GEMINI_BASE_URL: z.string().default("https://generativelanguage.googleapis.com/v1beta/openai/"),
  GEMINI_CHAT_MODEL: z.string().default("gemini-1.5-flash"),
  QWEN_API_KEY: z.string().default(""),
  QWEN_BASE_URL: z.string().default("https://dashscope.aliyuncs.com/compatible-mode/v1"),
  QWEN_CHAT_MODEL: z.string().default("qwen-plus"),
  LLM_MAX_CONCURRENT: z.coerce.number().int().positive().default(5),
  LLM_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(60),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  EXTRACTION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  ANSWER_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  NEO4J_URI: z.string().default("neo4j://localhost:7687"),
  NEO4J_USER: z.string().default("neo4j"),
  NEO4J_PASSWORD: z.string().default(""),
  NEO4J_DATABASE: z.string().default("neo4j"),
  SCHEMA_CACHE_TTL_MS: z.coerce.number().int().positive().default(300_000),
  SCHEMA_SAMPLE_LIMIT: z.coerce.number().int().positive().default(20),
  EXTRACTION_MAX_CHARS: z.coerce.number().int().positive().default(4000),
  INGEST_CONCURRENCY: z.coerce.number().int().positive().default(4)
});

export type AppConfig = z.infer<typeof envSchema>;
export const appConfig: AppConfig = envSchema.parse(process.env);
