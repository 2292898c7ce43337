const defaultEntityLabels = [
  "Satellite",
  "Sensor",
  "DataProduct",
  "Organization",
  "Mission",
  "Parameter",
  "Region"
];

const defaultRelationshipTypes = [
  "CARRIES",
  "OPERATES",
  "PRODUCES",
  "MEASURES",
  "MONITORS",
  "PART_OF",
  "DEVELOPED_BY"
];

const EXTRACTION_JSON_SCHEMA = `
{
  "nodes": [
    { "id": "proper name of the entity, e.g. INSAT-3DR", "label": "PascalCase type, e.g. Satellite" }
  ],
  "edges": [
    {
      "source_node_id": "id of the source node",
      "target_node_id": "id of the target node",
      "type": "SCREAMING_SNAKE_CASE verb phrase, e.g. CARRIES"
    }
  ]
}
`.trim();

export function buildExtractionSystemPrompt(): string {
  return `
You are an expert knowledge graph engineer working on documents about satellites, sensors and remote sensing data products.
From the text you are given, extract the relevant entities and the relationships between them.

Entities:
- "id": the proper name of the entity (e.g. "INSAT-3DR"). It will be upper-cased later.
- "label": a general type in PascalCase. Prefer one of: ${defaultEntityLabels.join(", ")}.

Relationships:
- Refer to entities by their "id".
- "type": a verb phrase in SCREAMING_SNAKE_CASE. Prefer one of: ${defaultRelationshipTypes.join(", ")}.
- Only connect entities that also appear in "nodes".

Return a single valid JSON object with exactly this shape and nothing else:
${EXTRACTION_JSON_SCHEMA}
`.trim();
}

export function buildExtractionUserPrompt(text: string, title: string): string {
  return `Page title: "${title}"\n\nText to analyze:\n"""\n${text}\n"""`;
}
