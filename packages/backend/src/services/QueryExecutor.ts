import type { QueryStore, ResultRow } from "@graphqa/shared";
import { logger } from "../utils/logger.js";

/**
 * Boundary between generated Cypher and the store. Failures (syntax errors in
 * generated text, lost connections) are logged and read as "no results".
 */
export class QueryExecutor {
  constructor(private readonly store: QueryStore) {}

  async execute(queryText: string): Promise<ResultRow[]> {
    try {
      return await this.store.runQuery(queryText, {}, "READ");
    } catch (error) {
      logger.warn({ err: error, query: queryText }, "Cypher execution failed");
      return [];
    }
  }
}
