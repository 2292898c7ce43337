import type { IngestResult, MergeStats } from "@graphqa/shared";
import { appConfig } from "../config.js";
import { logger } from "../utils/logger.js";
import type { GraphMerger } from "./GraphMerger.js";
import type {
  GraphExtractor,
  IngestionDocument,
  IngestionPipelineOptions,
  KnownEntity
} from "./types.js";

const defaultOptions: IngestionPipelineOptions = {
  concurrency: appConfig.INGEST_CONCURRENCY
};

export class IngestionPipeline {
  private readonly options: IngestionPipelineOptions;
  private readonly documentQueues = new Map<string, Promise<unknown>>();

  constructor(
    private readonly extractor: GraphExtractor,
    private readonly merger: GraphMerger,
    options: Partial<IngestionPipelineOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  async ingestMany(documents: IngestionDocument[]): Promise<IngestResult[]> {
    const results: IngestResult[] = new Array(documents.length);

    await runWithConcurrency(documents, this.options.concurrency, async (document, index) => {
      results[index] = await this.ingest(document);
    });

    return results;
  }

  /** Documents sharing a filename are processed one after another. */
  ingest(document: IngestionDocument): Promise<IngestResult> {
    return this.serializeByFilename(document.filename, () => this.process(document));
  }

  async seedKnownEntities(entities: KnownEntity[]): Promise<MergeStats> {
    const stats = await this.merger.seedEntities(entities);
    logger.info({ ...stats }, "Seeded known entities");
    return stats;
  }

  private async process(document: IngestionDocument): Promise<IngestResult> {
    const { filename, title, text } = document;

    if (text.trim().length === 0) {
      logger.info({ filename }, "Skipping document without text");
      return { filename, status: "skipped", reason: "empty_text" };
    }

    try {
      const extracted = await this.extractor.extract(text, title);
      const stats = await this.merger.mergeDocument(extracted, { filename, title });

      logger.info(
        {
          filename,
          extractedNodes: extracted.nodes.length,
          extractedEdges: extracted.edges.length,
          ...stats
        },
        "Document merged"
      );

      return {
        filename,
        status: "merged",
        extracted: { nodes: extracted.nodes.length, edges: extracted.edges.length },
        stats
      };
    } catch (error) {
      logger.error({ err: error, filename }, "Document ingestion failed");
      return {
        filename,
        status: "failed",
        error: error instanceof Error ? error.message : String(error)
      };
    }
  }

  private serializeByFilename<T>(filename: string, task: () => Promise<T>): Promise<T> {
    const previous = this.documentQueues.get(filename) ?? Promise.resolve();
    const next = previous.then(task, task);
    const settled = next.then(
      () => undefined,
      () => undefined
    );
    this.documentQueues.set(filename, settled);
    void settled.then(() => {
      if (this.documentQueues.get(filename) === settled) {
        this.documentQueues.delete(filename);
      }
    });
    return next;
  }
}

async function runWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  if (items.length === 0) {
    return;
  }

  const safeConcurrency = Math.max(1, concurrency);
  let current = 0;

  const runners = Array.from({ length: Math.min(safeConcurrency, items.length) }, async () => {
    while (true) {
      const index = current;
      current += 1;
      if (index >= items.length) {
        break;
      }

      const item = items[index];
      if (item === undefined) {
        break;
      }
      await worker(item, index);
    }
  });

  await Promise.all(runners);
}
