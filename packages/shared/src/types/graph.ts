export interface ExtractedNode {
  id: string;
  label: string;
}

export interface ExtractedEdge {
  source_node_id: string;
  target_node_id: string;
  type: string;
}

/**
 * Raw node/edge list produced by the language model for one source document.
 * Lives only between extraction and merge.
 */
export interface ExtractedGraphDocument {
  nodes: ExtractedNode[];
  edges: ExtractedEdge[];
}

export interface PageProvenance {
  filename: string;
  title: string;
}

export interface EntityRecord {
  id: string;
  label: string;
}

export interface RelationshipRecord {
  sourceId: string;
  targetId: string;
  type: string;
}

export type RelationshipMergeOutcome = "merged" | "missing_endpoint";

export interface MergeStats {
  nodesMerged: number;
  nodesCreated: number;
  nodesRejected: number;
  edgesMerged: number;
  edgesRejected: number;
  edgesDropped: number;
}

export interface LabelCount {
  label: string;
  count: number;
}

export interface RelationshipTypeCount {
  type: string;
  count: number;
}

export interface SchemaSample {
  label: string;
  propertyKeys: string[];
  sampleId: string | null;
}

export interface SchemaSummary {
  nodeCounts: LabelCount[];
  relationshipCounts: RelationshipTypeCount[];
  samples: SchemaSample[];
}

export type ResultRow = Record<string, unknown>;

export interface QuestionAnswerExchange {
  question: string;
  cypherQuery: string;
  results: ResultRow[];
  answer: string;
  resultCount: number;
}
