export { ANSWER_SYSTEM_PROMPT, buildAnswerUserPrompt } from "./answer.js";
export { MAX_QUERY_RESULTS, buildCypherSystemPrompt } from "./cypher.js";
export { buildExtractionSystemPrompt, buildExtractionUserPrompt } from "./extraction.js";
