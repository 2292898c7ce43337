import neo4j, {
  isDate,
  isDateTime,
  isDuration,
  isInt,
  isLocalDateTime,
  isLocalTime,
  isNode,
  isPath,
  isPoint,
  isRelationship,
  isTime,
  type Driver,
  type Record as Neo4jRecord,
  type Session,
  type SessionConfig
} from "neo4j-driver";
import type {
  AbstractGraphStore,
  AccessMode,
  EntityRecord,
  LabelCount,
  PageProvenance,
  QueryParameters,
  RelationshipMergeOutcome,
  RelationshipRecord,
  RelationshipTypeCount,
  ResultRow,
  SchemaSample,
  SchemaSummary
} from "@graphqa/shared";
import { appConfig } from "../config.js";
import {
  ENTITY_LABEL,
  MENTIONS_RELATIONSHIP,
  PAGE_LABEL,
  assertSafeTag
} from "../utils/identifiers.js";

export interface Neo4jGraphStoreConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
}

export class Neo4jGraphStore implements AbstractGraphStore {
  private driver: Driver | null = null;

  constructor(private readonly config: Neo4jGraphStoreConfig) {}

  static fromEnv(): Neo4jGraphStore {
    return new Neo4jGraphStore({
      uri: appConfig.NEO4J_URI,
      user: appConfig.NEO4J_USER,
      password: appConfig.NEO4J_PASSWORD,
      database: appConfig.NEO4J_DATABASE
    });
  }

  async connect(): Promise<void> {
    if (this.driver) {
      return;
    }

    this.driver = neo4j.driver(
      this.config.uri,
      neo4j.auth.basic(this.config.user, this.config.password)
    );

    try {
      await this.driver.verifyConnectivity();
      await this.ensureConstraints();
    } catch (error) {
      await this.disconnect();
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.driver) {
      return;
    }

    await this.driver.close();
    this.driver = null;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.driver) {
      return false;
    }

    try {
      await this.withSession("READ", async (session) => {
        await session.run("RETURN 1 AS ok");
      });
      return true;
    } catch {
      return false;
    }
  }

  async runQuery(
    query: string,
    params: QueryParameters = {},
    accessMode: AccessMode = "READ"
  ): Promise<ResultRow[]> {
    return this.withSession(accessMode, async (session) => {
      const result = await session.run(query, params);
      return result.records.map((record) => this.toRow(record));
    });
  }

  async upsertPage(page: PageProvenance): Promise<void> {
    await this.withSession("WRITE", async (session) => {
      await session.run(
        `
        MERGE (p:${PAGE_LABEL} {filename: $filename})
        SET p.title = $title
        `,
        { filename: page.filename, title: page.title }
      );
    });
  }

  /**
   * Merges on the structural Entity label so ids stay unique across type
   * labels; the extracted label is added on top. `timestamp()` is constant
   * within one statement, so equality with `created_at` means this call
   * created the node.
   */
  async mergeEntity(entity: EntityRecord): Promise<{ created: boolean }> {
    const label = assertSafeTag(entity.label);

    return this.withSession("WRITE", async (session) => {
      const result = await session.run(
        `
        MERGE (n:${ENTITY_LABEL} {id: $id})
        ON CREATE SET n.created_at = timestamp()
        SET n:\`${label}\`
        RETURN n.created_at = timestamp() AS created
        `,
        { id: entity.id }
      );

      return { created: result.records[0]?.get("created") === true };
    });
  }

  async linkMention(filename: string, entityId: string): Promise<void> {
    await this.withSession("WRITE", async (session) => {
      await session.run(
        `
        MATCH (p:${PAGE_LABEL} {filename: $filename})
        MATCH (n:${ENTITY_LABEL} {id: $id})
        MERGE (p)-[:${MENTIONS_RELATIONSHIP}]->(n)
        `,
        { filename, id: entityId }
      );
    });
  }

  async mergeRelationship(relationship: RelationshipRecord): Promise<RelationshipMergeOutcome> {
    const type = assertSafeTag(relationship.type);

    return this.withSession("WRITE", async (session) => {
      const result = await session.run(
        `
        MATCH (source:${ENTITY_LABEL} {id: $sourceId})
        MATCH (target:${ENTITY_LABEL} {id: $targetId})
        MERGE (source)-[r:\`${type}\`]->(target)
        RETURN count(r) AS merged
        `,
        { sourceId: relationship.sourceId, targetId: relationship.targetId }
      );

      return this.toNumber(result.records[0]?.get("merged")) > 0 ? "merged" : "missing_endpoint";
    });
  }

  async loadSchemaSummary(sampleLimit: number): Promise<SchemaSummary> {
    const safeLimit = Math.max(1, Math.floor(sampleLimit));

    return this.withSession("READ", async (session) => {
      const labelResult = await session.run(
        `
        MATCH (n)
        WHERE NOT n:${PAGE_LABEL}
        UNWIND labels(n) AS label
        WITH label
        WHERE label <> '${ENTITY_LABEL}'
        RETURN label, count(*) AS count
        ORDER BY count DESC, label ASC
        `
      );

      const relationshipResult = await session.run(
        `
        MATCH ()-[r]->()
        WHERE type(r) <> '${MENTIONS_RELATIONSHIP}'
        RETURN type(r) AS type, count(r) AS count
        ORDER BY count DESC, type ASC
        `
      );

      const sampleResult = await session.run(
        `
        MATCH (n)
        WHERE NOT n:${PAGE_LABEL}
        RETURN coalesce([l IN labels(n) WHERE l <> '${ENTITY_LABEL}'][0], '${ENTITY_LABEL}') AS label,
               keys(n) AS propertyKeys,
               n.id AS sampleId
        LIMIT $limit
        `,
        { limit: neo4j.int(safeLimit) }
      );

      const nodeCounts: LabelCount[] = labelResult.records.map((record) => ({
        label: this.toString(record.get("label"), ""),
        count: this.toNumber(record.get("count"))
      }));
      const relationshipCounts: RelationshipTypeCount[] = relationshipResult.records.map(
        (record) => ({
          type: this.toString(record.get("type"), ""),
          count: this.toNumber(record.get("count"))
        })
      );
      const samples: SchemaSample[] = sampleResult.records.map((record) => ({
        label: this.toString(record.get("label"), ENTITY_LABEL),
        propertyKeys: this.toStringArray(record.get("propertyKeys")),
        sampleId: this.toOptionalString(record.get("sampleId")) ?? null
      }));

      return { nodeCounts, relationshipCounts, samples };
    });
  }

  private async ensureConstraints(): Promise<void> {
    await this.withSession("WRITE", async (session) => {
      await session.run(
        `CREATE CONSTRAINT entity_id_unique IF NOT EXISTS FOR (e:${ENTITY_LABEL}) REQUIRE e.id IS UNIQUE`
      );
      await session.run(
        `CREATE CONSTRAINT page_filename_unique IF NOT EXISTS FOR (p:${PAGE_LABEL}) REQUIRE p.filename IS UNIQUE`
      );
    });
  }

  private withSession<T>(accessMode: AccessMode, fn: (session: Session) => Promise<T>): Promise<T> {
    const sessionConfig: SessionConfig = {
      defaultAccessMode: accessMode === "READ" ? neo4j.session.READ : neo4j.session.WRITE
    };
    if (this.config.database) {
      sessionConfig.database = this.config.database;
    }

    const session = this.getDriver().session(sessionConfig);

    return fn(session).finally(async () => {
      await session.close();
    });
  }

  private getDriver(): Driver {
    if (!this.driver) {
      throw new Error("Neo4jGraphStore is not connected. Call connect() first.");
    }

    return this.driver;
  }

  private toRow(record: Neo4jRecord): ResultRow {
    const row: ResultRow = {};
    for (const key of record.keys) {
      const column = String(key);
      row[column] = this.toPlainValue(record.get(column));
    }
    return row;
  }

  private toPlainValue(value: unknown): unknown {
    if (value === null || value === undefined) {
      return null;
    }
    if (isInt(value)) {
      return value.inSafeRange() ? value.toNumber() : value.toString();
    }
    if (isNode(value)) {
      return this.toPlainValue(value.properties);
    }
    if (isRelationship(value)) {
      return { type: value.type, ...this.toPlainRecord(value.properties) };
    }
    if (isPath(value)) {
      return value.segments.map((segment) => ({
        start: this.toPlainValue(segment.start),
        relationship: this.toPlainValue(segment.relationship),
        end: this.toPlainValue(segment.end)
      }));
    }
    if (
      isDate(value) ||
      isDateTime(value) ||
      isLocalDateTime(value) ||
      isTime(value) ||
      isLocalTime(value) ||
      isDuration(value) ||
      isPoint(value)
    ) {
      return value.toString();
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.toPlainValue(item));
    }
    if (typeof value === "object") {
      return this.toPlainRecord(value);
    }
    return value;
  }

  private toPlainRecord(value: object): Record<string, unknown> {
    const plain: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      plain[key] = this.toPlainValue(item);
    }
    return plain;
  }

  private toString(value: unknown, fallback: string): string {
    if (typeof value === "string") {
      return value;
    }
    if (typeof value === "number" || typeof value === "boolean") {
      return String(value);
    }
    return fallback;
  }

  private toOptionalString(value: unknown): string | undefined {
    if (typeof value === "string") {
      return value;
    }
    return undefined;
  }

  private toStringArray(value: unknown): string[] {
    if (!Array.isArray(value)) {
      return [];
    }
    return value.map((item) => String(item));
  }

  private toNumber(value: unknown, fallback = 0): number {
    if (typeof value === "number") {
      return Number.isFinite(value) ? value : fallback;
    }
    if (isInt(value)) {
      return value.toNumber();
    }
    if (typeof value === "string" && value.trim() !== "") {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
    }
    return fallback;
  }
}
