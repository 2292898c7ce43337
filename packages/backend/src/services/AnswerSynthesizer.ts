import type { ResultRow } from "@graphqa/shared";
import { logger } from "../utils/logger.js";
import type { LLMServiceLike } from "./llmTypes.js";
import { formatRow, formatRowsForPrompt } from "./resultFormatting.js";

export const NO_RESULTS_ANSWER =
  "I couldn't find any relevant information in the knowledge graph to answer your question.";

export type AnswerSynthesis =
  | { source: "model"; answer: string }
  | { source: "fallback"; answer: string }
  | { source: "no_results"; answer: string };

interface AnswerSynthesizerOptions {
  promptRowLimit: number;
  fallbackRowLimit: number;
}

const defaultOptions: AnswerSynthesizerOptions = {
  promptRowLimit: 15,
  fallbackRowLimit: 10
};

export class AnswerSynthesizer {
  private readonly options: AnswerSynthesizerOptions;

  constructor(
    private readonly llmService: Pick<LLMServiceLike, "generateAnswer">,
    options: Partial<AnswerSynthesizerOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  async synthesize(question: string, cypherQuery: string, rows: ResultRow[]): Promise<AnswerSynthesis> {
    if (rows.length === 0) {
      return { source: "no_results", answer: NO_RESULTS_ANSWER };
    }

    try {
      const answer = await this.llmService.generateAnswer({
        question,
        cypherQuery,
        resultsText: formatRowsForPrompt(rows, this.options.promptRowLimit)
      });
      if (answer.trim().length > 0) {
        return { source: "model", answer: answer.trim() };
      }
      logger.warn({ question }, "Model returned an empty answer");
    } catch (error) {
      logger.warn({ err: error, question }, "Answer generation failed, using templated answer");
    }

    return { source: "fallback", answer: this.fallbackAnswer(rows) };
  }

  fallbackAnswer(rows: ResultRow[]): string {
    const lines = ["Here's what I found:"];

    for (const row of rows.slice(0, this.options.fallbackRowLimit)) {
      const rendered = formatRow(row);
      if (rendered.length > 0) {
        lines.push(`• ${rendered}`);
      }
    }

    if (rows.length > this.options.fallbackRowLimit) {
      lines.push(`... and ${rows.length - this.options.fallbackRowLimit} more results.`);
    }

    return lines.join("\n");
  }
}
