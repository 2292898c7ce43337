import type { EntityRecord, ExtractedGraphDocument, IngestDocumentInput } from "@graphqa/shared";

export interface ExtractionEngineOptions {
  maxChars: number;
}

export interface GraphExtractor {
  extract(text: string, title: string): Promise<ExtractedGraphDocument>;
}

export interface IngestionPipelineOptions {
  concurrency: number;
}

export type IngestionDocument = IngestDocumentInput;

export type KnownEntity = EntityRecord;
