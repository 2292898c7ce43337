import { describe, expect, it } from "vitest";
import { AnswerSynthesizer, NO_RESULTS_ANSWER } from "../../../src/services/AnswerSynthesizer.js";
import { QueryExecutor } from "../../../src/services/QueryExecutor.js";
import { QuerySynthesizer } from "../../../src/services/QuerySynthesizer.js";
import {
  InvalidQuestionError,
  QuestionAnsweringService
} from "../../../src/services/QuestionAnsweringService.js";
import { SchemaCache } from "../../../src/services/SchemaCache.js";
import { FakeGraphStore } from "../../helpers/FakeGraphStore.js";
import { FakeLLMService } from "../../helpers/FakeLLMService.js";

function createService(store: FakeGraphStore, llm: FakeLLMService): QuestionAnsweringService {
  return new QuestionAnsweringService(
    new QuerySynthesizer(new SchemaCache(store), llm),
    new QueryExecutor(store),
    new AnswerSynthesizer(llm)
  );
}

describe("QuestionAnsweringService", () => {
  it("answers from the graph when the model is unavailable", async () => {
    const store = new FakeGraphStore({
      queryHandler: (query) =>
        query.includes("(s:Satellite)")
          ? [{ satellite: "INSAT-3DR", type: ["Entity", "Satellite"] }]
          : []
    });
    await store.mergeEntity({ id: "INSAT-3DR", label: "Satellite" });
    const service = createService(store, new FakeLLMService({ unavailable: true }));

    const exchange = await service.answerQuestion("  Which satellites are in the graph?  ");

    expect(exchange).toEqual({
      question: "Which satellites are in the graph?",
      cypherQuery: "MATCH (s:Satellite) RETURN s.id AS satellite, labels(s) AS type LIMIT 10;",
      results: [{ satellite: "INSAT-3DR", type: ["Entity", "Satellite"] }],
      answer: "Here's what I found:\n• satellite: INSAT-3DR, type: [Entity, Satellite]",
      resultCount: 1
    });
  });

  it("answers which sensors a satellite carries through the fallback path", async () => {
    const store = new FakeGraphStore({
      queryHandler: (query) =>
        query.includes("(s:Sensor)") ? [{ sensor: "IMAGER", type: ["Entity", "Sensor"] }] : []
    });
    await store.mergeEntity({ id: "INSAT-3DR", label: "Satellite" });
    await store.mergeEntity({ id: "IMAGER", label: "Sensor" });
    await store.mergeRelationship({ sourceId: "INSAT-3DR", targetId: "IMAGER", type: "CARRIES" });
    const service = createService(store, new FakeLLMService({ unavailable: true }));

    const exchange = await service.answerQuestion("Which sensors are carried by INSAT-3DR?");

    expect(exchange.cypherQuery).toBe(
      "MATCH (s:Sensor) RETURN s.id AS sensor, labels(s) AS type LIMIT 10;"
    );
    expect(exchange.resultCount).toBe(1);
    expect(exchange.answer).toBe("Here's what I found:\n• sensor: IMAGER, type: [Entity, Sensor]");
  });

  it("returns the model answer for a model query", async () => {
    const store = new FakeGraphStore({
      queryHandler: () => [{ sensor: "IMAGER" }]
    });
    const llm = new FakeLLMService({
      cypher: "MATCH (:Satellite {id: 'INSAT-3DR'})-[:CARRIES]->(s) RETURN s.id AS sensor",
      answer: "INSAT-3DR carries the IMAGER."
    });
    const service = createService(store, llm);

    const exchange = await service.answerQuestion("What does INSAT-3DR carry?");

    expect(exchange.cypherQuery).toBe(
      "MATCH (:Satellite {id: 'INSAT-3DR'})-[:CARRIES]->(s) RETURN s.id AS sensor;"
    );
    expect(exchange.answer).toBe("INSAT-3DR carries the IMAGER.");
    expect(exchange.resultCount).toBe(1);
    expect(llm.cypherCalls[0]?.schemaDescription).toBe("(the graph is empty)");
  });

  it("reports no results when the query fails", async () => {
    const store = new FakeGraphStore();
    store.failQueries = true;
    const service = createService(store, new FakeLLMService());

    const exchange = await service.answerQuestion("Who operates MOSDAC?");

    expect(exchange.results).toEqual([]);
    expect(exchange.resultCount).toBe(0);
    expect(exchange.answer).toBe(NO_RESULTS_ANSWER);
  });

  it("rejects a blank question", async () => {
    const service = createService(new FakeGraphStore(), new FakeLLMService());

    await expect(service.answerQuestion("   ")).rejects.toThrow(InvalidQuestionError);
  });
});
