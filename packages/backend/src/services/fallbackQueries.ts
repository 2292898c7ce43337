interface KeywordRule {
  name: "satellite" | "sensor" | "relationship";
  keywords: readonly string[];
  query: string;
}

export const GENERIC_ENTITY_QUERY =
  "MATCH (n:Entity) RETURN [label IN labels(n) WHERE label <> 'Entity'][0] AS type, n.id AS entity LIMIT 20;";

export const keywordRules: readonly KeywordRule[] = [
  {
    name: "satellite",
    keywords: ["satellite"],
    query: "MATCH (s:Satellite) RETURN s.id AS satellite, labels(s) AS type LIMIT 10;"
  },
  {
    name: "sensor",
    keywords: ["sensor"],
    query: "MATCH (s:Sensor) RETURN s.id AS sensor, labels(s) AS type LIMIT 10;"
  },
  {
    name: "relationship",
    keywords: ["relationship", "connection", "related"],
    query:
      "MATCH (n:Entity)-[r]->(m:Entity) RETURN n.id AS source, type(r) AS relationship, m.id AS target LIMIT 20;"
  }
];

/** Keyword-matched canned query. Pure and total. */
export function fallbackQuery(question: string): string {
  const lowered = question.toLowerCase();
  const rule = keywordRules.find((candidate) =>
    candidate.keywords.some((keyword) => lowered.includes(keyword))
  );
  return rule?.query ?? GENERIC_ENTITY_QUERY;
}
