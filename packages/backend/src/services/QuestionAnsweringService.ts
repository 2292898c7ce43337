import type { QuestionAnswerExchange } from "@graphqa/shared";
import { logger } from "../utils/logger.js";
import type { AnswerSynthesizer } from "./AnswerSynthesizer.js";
import type { QueryExecutor } from "./QueryExecutor.js";
import type { QuerySynthesizer } from "./QuerySynthesizer.js";

export class InvalidQuestionError extends Error {
  constructor() {
    super("Question must be a non-empty string");
    this.name = "InvalidQuestionError";
  }
}

export class QuestionAnsweringService {
  constructor(
    private readonly querySynthesizer: QuerySynthesizer,
    private readonly queryExecutor: QueryExecutor,
    private readonly answerSynthesizer: AnswerSynthesizer
  ) {}

  async answerQuestion(rawQuestion: string): Promise<QuestionAnswerExchange> {
    const question = rawQuestion.trim();
    if (question.length === 0) {
      throw new InvalidQuestionError();
    }

    const generation = await this.querySynthesizer.generate(question);
    const results = await this.queryExecutor.execute(generation.query);
    const answer = await this.answerSynthesizer.synthesize(question, generation.query, results);

    logger.info(
      {
        querySource: generation.source,
        answerSource: answer.source,
        resultCount: results.length
      },
      "Question answered"
    );

    return {
      question,
      cypherQuery: generation.query,
      results,
      answer: answer.answer,
      resultCount: results.length
    };
  }
}
