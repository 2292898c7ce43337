import { describe, expect, it, vi } from "vitest";
import { LLMRateLimiter } from "../../../src/services/LLMRateLimiter.js";
import {
  LLMService,
  MAX_USAGE_RECORDS,
  openAIClientOptions
} from "../../../src/services/LLMService.js";
import type { ChatCompletionResponse } from "../../../src/services/llmTypes.js";

function completion(content: string): ChatCompletionResponse {
  return {
    choices: [{ message: { content } }],
    usage: { prompt_tokens: 10, completion_tokens: 20 }
  };
}

function createService(create: ReturnType<typeof vi.fn>): LLMService {
  return new LLMService(
    {
      apiKey: "test-secret",
      chatModel: "llama3"
    },
    {
      client: { chat: { completions: { create } } },
      rateLimiter: new LLMRateLimiter({
        maxConcurrent: 5,
        requestsPerMinute: 10_000,
        timeoutMs: 5000
      })
    }
  );
}

describe("LLMService", () => {
  it("extracts a node and edge list from a JSON response", async () => {
    const create = vi.fn().mockResolvedValue(
      completion(
        JSON.stringify({
          nodes: [
            { id: "INSAT-3DR", label: "Satellite" },
            { id: "Imager", label: "Sensor" }
          ],
          edges: [{ source_node_id: "INSAT-3DR", target_node_id: "Imager", type: "carries" }]
        })
      )
    );
    const service = createService(create);

    const result = await service.extractGraph("INSAT-3DR carries an Imager.", "INSAT-3DR");

    expect(result.nodes).toEqual([
      { id: "INSAT-3DR", label: "Satellite" },
      { id: "Imager", label: "Sensor" }
    ]);
    expect(result.edges).toHaveLength(1);
    expect(create.mock.calls[0]?.[0]).toMatchObject({
      model: "llama3",
      temperature: 0,
      response_format: { type: "json_object" }
    });
    expect(service.getUsageRecords()).toMatchObject([
      { phase: "extraction", model: "llama3", promptTokens: 10, completionTokens: 20 }
    ]);
  });

  it("reads JSON wrapped in surrounding prose", async () => {
    const create = vi
      .fn()
      .mockResolvedValue(
        completion('Here is the graph: {"nodes":[{"id":"MOSDAC","label":"Organization"}]} Done.')
      );
    const service = createService(create);

    const result = await service.extractGraph("MOSDAC hosts data.", "MOSDAC");

    expect(result).toEqual({
      nodes: [{ id: "MOSDAC", label: "Organization" }],
      edges: []
    });
  });

  it("rejects output that does not match the node schema", async () => {
    const create = vi.fn().mockResolvedValue(completion("no graph here"));
    const service = createService(create);

    await expect(service.extractGraph("text", "title")).rejects.toThrow();
  });

  it("returns raw query text and a trimmed answer", async () => {
    const create = vi
      .fn()
      .mockResolvedValueOnce(completion("```cypher\nMATCH (s:Satellite) RETURN s.id\n```"))
      .mockResolvedValueOnce(completion("  INSAT-3DR carries an imager.  \n"));
    const service = createService(create);

    const query = await service.generateCypher({
      question: "Which satellites exist?",
      schemaDescription: "Node labels:\n- Satellite: 1 nodes"
    });
    const answer = await service.generateAnswer({
      question: "What does INSAT-3DR carry?",
      cypherQuery: "MATCH (n) RETURN n;",
      resultsText: "Result 1: sensor: IMAGER"
    });

    expect(query).toBe("```cypher\nMATCH (s:Satellite) RETURN s.id\n```");
    expect(answer).toBe("INSAT-3DR carries an imager.");
    expect(create.mock.calls[1]?.[0]).toMatchObject({ temperature: 0.3 });
    expect(service.getUsageRecords().map((record) => record.phase)).toEqual(["query", "answer"]);

    service.clearUsageRecords();
    expect(service.getUsageRecords()).toEqual([]);
  });

  it("propagates client failures from ping", async () => {
    const create = vi.fn().mockRejectedValue(new Error("connect ECONNREFUSED"));
    const service = createService(create);

    await expect(service.ping()).rejects.toThrow("connect ECONNREFUSED");
  });

  it("calls the model once when it answers with a server error", async () => {
    const create = vi
      .fn()
      .mockRejectedValue(Object.assign(new Error("Service Unavailable"), { status: 503 }));
    const service = createService(create);

    await expect(
      service.generateCypher({ question: "Which sensors exist?", schemaDescription: "(the graph is empty)" })
    ).rejects.toThrow("Service Unavailable");
    expect(create).toHaveBeenCalledTimes(1);
  });

  it("disables the SDK's own retries", () => {
    expect(openAIClientOptions("test-secret", "http://localhost:11434/v1")).toEqual({
      apiKey: "test-secret",
      baseURL: "http://localhost:11434/v1",
      maxRetries: 0
    });
  });

  it("keeps only the most recent usage records", async () => {
    const create = vi.fn().mockResolvedValue(completion("An answer."));
    const service = createService(create);
    const input = { question: "q", cypherQuery: "MATCH (n) RETURN n;", resultsText: "Result 1: id: A" };

    for (let index = 0; index < MAX_USAGE_RECORDS + 50; index += 1) {
      await service.generateAnswer(input);
    }

    expect(service.getUsageRecords(1_000_000)).toHaveLength(MAX_USAGE_RECORDS);
  });
});
