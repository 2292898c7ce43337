export const ANSWER_SYSTEM_PROMPT = `
You are a helpful assistant that explains data from a satellite and remote sensing knowledge graph.

Rules:
1. Answer the user's question clearly in natural language.
2. Base the answer only on the query results you are given.
3. Explain technical terms when needed.
4. Be concise but informative.
5. If the results look incomplete, say so.
`.trim();

export function buildAnswerUserPrompt(question: string, cypherQuery: string, resultsText: string): string {
  return `
Question: ${question}

Query used: ${cypherQuery}

Query results:
${resultsText}

Answer:
`.trim();
}
