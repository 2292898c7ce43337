import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { createQaRouter } from "../../src/routes/qa.js";
import { AnswerSynthesizer } from "../../src/services/AnswerSynthesizer.js";
import { QueryExecutor } from "../../src/services/QueryExecutor.js";
import { QuerySynthesizer } from "../../src/services/QuerySynthesizer.js";
import { QuestionAnsweringService } from "../../src/services/QuestionAnsweringService.js";
import { SchemaCache } from "../../src/services/SchemaCache.js";
import { FakeGraphStore } from "../helpers/FakeGraphStore.js";
import { FakeLLMService } from "../helpers/FakeLLMService.js";

function createTestApp(store: FakeGraphStore, llm: FakeLLMService) {
  const schemaCache = new SchemaCache(store);
  const service = new QuestionAnsweringService(
    new QuerySynthesizer(schemaCache, llm),
    new QueryExecutor(store),
    new AnswerSynthesizer(llm)
  );
  const app = express();
  app.use(express.json());
  app.use(
    "/api",
    createQaRouter({
      service,
      schemaCache,
      ensureStoreConnected: () => store.connect()
    })
  );
  return app;
}

describe("qa api", () => {
  it("connects to the store", async () => {
    const app = createTestApp(new FakeGraphStore(), new FakeLLMService());

    const response = await request(app).post("/api/connect");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      status: "success",
      message: "Connected to the knowledge graph"
    });
  });

  it("reports a failed connection", async () => {
    const app = createTestApp(new FakeGraphStore({ failConnect: true }), new FakeLLMService());

    const response = await request(app).post("/api/connect");

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ status: "error", message: "Neo4j authentication failed" });
  });

  it("answers a question", async () => {
    const store = new FakeGraphStore({
      queryHandler: () => [{ sensor: "IMAGER" }, { sensor: "SOUNDER" }]
    });
    const app = createTestApp(
      store,
      new FakeLLMService({
        cypher: "MATCH (:Satellite {id: 'INSAT-3DR'})-[:CARRIES]->(s) RETURN s.id AS sensor",
        answer: "INSAT-3DR carries the IMAGER and the SOUNDER."
      })
    );

    const response = await request(app)
      .post("/api/ask")
      .send({ question: "What does INSAT-3DR carry?" });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      question: "What does INSAT-3DR carry?",
      cypherQuery: "MATCH (:Satellite {id: 'INSAT-3DR'})-[:CARRIES]->(s) RETURN s.id AS sensor;",
      results: [{ sensor: "IMAGER" }, { sensor: "SOUNDER" }],
      answer: "INSAT-3DR carries the IMAGER and the SOUNDER.",
      resultCount: 2
    });
  });

  it("rejects a missing question", async () => {
    const app = createTestApp(new FakeGraphStore(), new FakeLLMService());

    const response = await request(app).post("/api/ask").send({});

    expect(response.status).toBe(400);
    expect(response.body.error).toBe("Validation failed");
  });

  it("answers 503 when the store is unavailable", async () => {
    const store = new FakeGraphStore({ failConnect: true });
    const app = createTestApp(store, new FakeLLMService());

    const response = await request(app).post("/api/ask").send({ question: "Which satellites?" });

    expect(response.status).toBe(503);
    expect(response.body).toEqual({ error: "Backend unavailable" });
    expect(store.queries).toHaveLength(0);
  });

  it("returns the schema summary", async () => {
    const store = new FakeGraphStore();
    await store.mergeEntity({ id: "INSAT-3DR", label: "Satellite" });
    const app = createTestApp(store, new FakeLLMService());

    const response = await request(app).get("/api/schema");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      nodeCounts: [{ label: "Satellite", count: 1 }],
      relationshipCounts: [],
      samples: [{ label: "Satellite", propertyKeys: ["created_at", "id"], sampleId: "INSAT-3DR" }]
    });
  });

  it("answers 503 when the schema cannot be loaded", async () => {
    const store = new FakeGraphStore();
    store.failSchema = true;
    const app = createTestApp(store, new FakeLLMService());

    const response = await request(app).get("/api/schema");

    expect(response.status).toBe(503);
    expect(response.body).toEqual({ error: "Schema unavailable" });
  });
});
