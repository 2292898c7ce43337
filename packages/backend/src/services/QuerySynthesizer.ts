import type { SchemaSummary } from "@graphqa/shared";
import { logger } from "../utils/logger.js";
import { fallbackQuery } from "./fallbackQueries.js";
import type { LLMServiceLike } from "./llmTypes.js";
import type { SchemaCache } from "./SchemaCache.js";

export type FallbackReason = "schema_unavailable" | "generation_failed" | "invalid_query";

export type QueryGeneration =
  | { source: "model"; query: string }
  | { source: "fallback"; query: string; reason: FallbackReason };

export class InvalidGeneratedQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidGeneratedQueryError";
  }
}

interface QuerySynthesizerOptions {
  maxLabels: number;
  maxRelationshipTypes: number;
  maxSamples: number;
}

const defaultOptions: QuerySynthesizerOptions = {
  maxLabels: 10,
  maxRelationshipTypes: 10,
  maxSamples: 5
};

const WRITE_CLAUSE_PATTERN = /\b(CREATE|MERGE|DELETE|DETACH|SET|REMOVE|DROP|FOREACH)\b|\bLOAD\s+CSV\b/i;

// String literals and backtick-quoted names, with escaped quotes inside them.
const QUOTED_PATTERN = /'(?:[^'\\]|\\.)*'|"(?:[^"\\]|\\.)*"|`[^`]*`/g;

export class QuerySynthesizer {
  private readonly options: QuerySynthesizerOptions;

  constructor(
    private readonly schemaCache: Pick<SchemaCache, "getSchema">,
    private readonly llmService: Pick<LLMServiceLike, "generateCypher">,
    options: Partial<QuerySynthesizerOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  async generate(question: string): Promise<QueryGeneration> {
    let schema: SchemaSummary;
    try {
      schema = await this.schemaCache.getSchema();
    } catch (error) {
      return this.fallback(question, "schema_unavailable", error);
    }

    let raw: string;
    try {
      raw = await this.llmService.generateCypher({
        question,
        schemaDescription: this.describeSchema(schema)
      });
    } catch (error) {
      return this.fallback(question, "generation_failed", error);
    }

    try {
      return { source: "model", query: cleanCypherQuery(raw) };
    } catch (error) {
      return this.fallback(question, "invalid_query", error);
    }
  }

  describeSchema(schema: SchemaSummary): string {
    const parts: string[] = [];

    if (schema.nodeCounts.length > 0) {
      parts.push("Node labels:");
      for (const { label, count } of schema.nodeCounts.slice(0, this.options.maxLabels)) {
        parts.push(`- ${label}: ${count} nodes`);
      }
    }

    if (schema.relationshipCounts.length > 0) {
      parts.push("", "Relationship types:");
      for (const { type, count } of schema.relationshipCounts.slice(
        0,
        this.options.maxRelationshipTypes
      )) {
        parts.push(`- ${type}: ${count} relationships`);
      }
    }

    const propertyExamples = new Map<string, string[]>();
    for (const sample of schema.samples.slice(0, this.options.maxSamples)) {
      if (!propertyExamples.has(sample.label)) {
        propertyExamples.set(sample.label, sample.propertyKeys);
      }
    }
    if (propertyExamples.size > 0) {
      parts.push("", "Node properties:");
      for (const [label, keys] of propertyExamples) {
        parts.push(`- ${label}: ${keys.join(", ")}`);
      }
    }

    return parts.length > 0 ? parts.join("\n") : "(the graph is empty)";
  }

  private fallback(question: string, reason: FallbackReason, error: unknown): QueryGeneration {
    const query = fallbackQuery(question);
    logger.warn({ err: error, reason, query }, "Cypher generation fell back to keyword rules");
    return { source: "fallback", query, reason };
  }
}

/**
 * Strips code fences and whitespace from model output and terminates the
 * statement with `;`. Throws when nothing usable is left, when more than one
 * statement is present, or when the query would write. Quoted text is ignored
 * by both checks.
 */
export function cleanCypherQuery(raw: string): string {
  const body = raw
    .replace(/```[A-Za-z]*[ \t]*\n?/g, "")
    .trim()
    .replace(/;+\s*$/, "")
    .trim();

  if (body.length === 0) {
    throw new InvalidGeneratedQueryError("Generated query is empty");
  }
  const structure = body.replace(QUOTED_PATTERN, "''");
  if (structure.includes(";")) {
    throw new InvalidGeneratedQueryError("Generated query contains more than one statement");
  }
  if (WRITE_CLAUSE_PATTERN.test(structure)) {
    throw new InvalidGeneratedQueryError("Generated query is not read-only");
  }

  return `${body};`;
}
