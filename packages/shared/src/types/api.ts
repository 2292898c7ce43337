import type {
  MergeStats,
  QuestionAnswerExchange,
  SchemaSummary
} from "./graph.js";

export interface ApiErrorResponse {
  error: string;
  details?: unknown;
}

export interface ConnectResponse {
  status: "success" | "error";
  message: string;
}

export interface AskRequest {
  question: string;
}

export type AskResponse = QuestionAnswerExchange;

export type SchemaResponse = SchemaSummary;

export interface IngestDocumentInput {
  filename: string;
  title: string;
  text: string;
}

export interface IngestDocumentsRequest {
  documents: IngestDocumentInput[];
}

export type IngestResult =
  | {
      filename: string;
      status: "merged";
      extracted: { nodes: number; edges: number };
      stats: MergeStats;
    }
  | {
      filename: string;
      status: "skipped";
      reason: "empty_text";
    }
  | {
      filename: string;
      status: "failed";
      error: string;
    };

export interface IngestDocumentsResponse {
  results: IngestResult[];
}

export interface SeedResponse {
  stats: MergeStats;
}

export interface HealthResponse {
  status: "ok" | "degraded";
  timestamp: string;
  uptimeSec: number;
  checks: {
    neo4j: "ok" | "failed" | "not_configured";
    llm: "ok" | "failed" | "not_configured";
  };
  /** Last schema snapshot served to query generation, if any. */
  schema: { version: number; fetchedAt: string } | null;
}
