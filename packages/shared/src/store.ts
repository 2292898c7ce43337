import type {
  EntityRecord,
  PageProvenance,
  RelationshipMergeOutcome,
  RelationshipRecord,
  ResultRow,
  SchemaSummary
} from "./types/graph.js";

export type AccessMode = "READ" | "WRITE";

export type QueryParameters = Record<string, unknown>;

export interface QueryStore {
  /** Runs one Cypher statement and materializes every record. Throws on failure. */
  runQuery(query: string, params?: QueryParameters, accessMode?: AccessMode): Promise<ResultRow[]>;
}

export interface MergeStore {
  upsertPage(page: PageProvenance): Promise<void>;
  mergeEntity(entity: EntityRecord): Promise<{ created: boolean }>;
  linkMention(filename: string, entityId: string): Promise<void>;
  mergeRelationship(relationship: RelationshipRecord): Promise<RelationshipMergeOutcome>;
}

export interface SchemaStore {
  loadSchemaSummary(sampleLimit: number): Promise<SchemaSummary>;
}

export interface AbstractGraphStore extends QueryStore, MergeStore, SchemaStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;
}
