import type { ExtractedGraphDocument } from "@graphqa/shared";
import { appConfig } from "../config.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";
import type { ExtractionEngineOptions, GraphExtractor } from "./types.js";

const defaultOptions: ExtractionEngineOptions = {
  maxChars: appConfig.EXTRACTION_MAX_CHARS
};

export function emptyGraphDocument(): ExtractedGraphDocument {
  return { nodes: [], edges: [] };
}

/** Cuts `text` to at most `maxChars` UTF-16 units without splitting a surrogate pair. */
export function boundedPrefix(text: string, maxChars: number): string {
  const prefix = text.slice(0, Math.max(0, maxChars));
  const last = prefix.charCodeAt(prefix.length - 1);
  return last >= 0xd800 && last <= 0xdbff ? prefix.slice(0, -1) : prefix;
}

export class ExtractionEngine implements GraphExtractor {
  private readonly options: ExtractionEngineOptions;

  constructor(
    private readonly llmService: Pick<LLMServiceLike, "extractGraph">,
    options: Partial<ExtractionEngineOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  /**
   * Never throws: a failed or malformed generation is logged and read as a
   * document with nothing in it.
   */
  async extract(text: string, title: string): Promise<ExtractedGraphDocument> {
    const prefix = boundedPrefix(text, this.options.maxChars);

    try {
      const document = await this.llmService.extractGraph(prefix, title);
      logger.debug(
        { title, nodes: document.nodes.length, edges: document.edges.length },
        "Graph extracted"
      );
      return document;
    } catch (error) {
      logger.warn({ err: error, title }, "Graph extraction failed, treating document as empty");
      return emptyGraphDocument();
    }
  }
}
