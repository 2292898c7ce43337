import { describe, expect, it } from "vitest";
import { boundedPrefix, ExtractionEngine } from "../../../src/pipeline/ExtractionEngine.js";
import { FakeLLMService } from "../../helpers/FakeLLMService.js";

describe("ExtractionEngine", () => {
  it("sends only the leading characters of the text", async () => {
    const llm = new FakeLLMService({
      extraction: { nodes: [{ id: "INSAT-3D", label: "Satellite" }], edges: [] }
    });
    const engine = new ExtractionEngine(llm, { maxChars: 10 });

    const document = await engine.extract("INSAT-3D is a meteorological satellite.", "INSAT-3D");

    expect(document.nodes).toEqual([{ id: "INSAT-3D", label: "Satellite" }]);
    expect(llm.extractCalls).toEqual([{ text: "INSAT-3D i", title: "INSAT-3D" }]);
  });

  it("does not split a surrogate pair at the cut", async () => {
    const llm = new FakeLLMService();
    const engine = new ExtractionEngine(llm, { maxChars: 3 });

    await engine.extract("ab\u{1F6F0}c", "Orbit");

    expect(llm.extractCalls).toEqual([{ text: "ab", title: "Orbit" }]);
    expect(boundedPrefix("ab\u{1F6F0}c", 4)).toBe("ab\u{1F6F0}");
    expect(boundedPrefix("abc", 0)).toBe("");
  });

  it("reads a failed generation as an empty document", async () => {
    const engine = new ExtractionEngine(new FakeLLMService({ unavailable: true }));

    await expect(engine.extract("Some text", "Title")).resolves.toEqual({ nodes: [], edges: [] });
  });
});
