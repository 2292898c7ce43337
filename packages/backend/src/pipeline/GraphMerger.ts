import type {
  ExtractedGraphDocument,
  MergeStats,
  MergeStore,
  PageProvenance
} from "@graphqa/shared";
import { normalize, sanitizeTag } from "../utils/identifiers.js";
import { logger } from "../utils/logger.js";
import type { KnownEntity } from "./types.js";

export function emptyMergeStats(): MergeStats {
  return {
    nodesMerged: 0,
    nodesCreated: 0,
    nodesRejected: 0,
    edgesMerged: 0,
    edgesRejected: 0,
    edgesDropped: 0
  };
}

/**
 * Upserts an extracted document into the store. Every step is a MERGE, so
 * replaying the same document leaves the graph unchanged.
 */
export class GraphMerger {
  constructor(private readonly store: MergeStore) {}

  async mergeDocument(doc: ExtractedGraphDocument, provenance: PageProvenance): Promise<MergeStats> {
    const stats = emptyMergeStats();

    await this.store.upsertPage(provenance);

    // Edges are only attempted once every node of this document is in place.
    for (const node of doc.nodes) {
      const id = normalize(node.id);
      const label = sanitizeTag(node.label, "label");
      if (id.length === 0 || label.length === 0) {
        stats.nodesRejected += 1;
        logger.warn({ filename: provenance.filename, node }, "Rejected extracted node");
        continue;
      }

      const { created } = await this.store.mergeEntity({ id, label });
      await this.store.linkMention(provenance.filename, id);
      stats.nodesMerged += 1;
      if (created) {
        stats.nodesCreated += 1;
      }
    }

    for (const edge of doc.edges) {
      const sourceId = normalize(edge.source_node_id);
      const targetId = normalize(edge.target_node_id);
      const type = sanitizeTag(edge.type, "relationship");
      if (sourceId.length === 0 || targetId.length === 0 || type.length === 0) {
        stats.edgesRejected += 1;
        logger.warn({ filename: provenance.filename, edge }, "Rejected extracted edge");
        continue;
      }

      const outcome = await this.store.mergeRelationship({ sourceId, targetId, type });
      if (outcome === "merged") {
        stats.edgesMerged += 1;
      } else {
        stats.edgesDropped += 1;
        logger.debug(
          { filename: provenance.filename, sourceId, targetId, type },
          "Dropped edge with missing endpoint"
        );
      }
    }

    return stats;
  }

  async seedEntities(entities: KnownEntity[]): Promise<MergeStats> {
    const stats = emptyMergeStats();

    for (const entity of entities) {
      const id = normalize(entity.id);
      const label = sanitizeTag(entity.label, "label");
      if (id.length === 0 || label.length === 0) {
        stats.nodesRejected += 1;
        continue;
      }

      const { created } = await this.store.mergeEntity({ id, label });
      stats.nodesMerged += 1;
      if (created) {
        stats.nodesCreated += 1;
      }
    }

    return stats;
  }
}
