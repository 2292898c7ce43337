import type { ResultRow } from "@graphqa/shared";

export function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => formatValue(item)).join(", ")}]`;
  }
  if (value !== null && typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

/** `key: value` pairs joined by ", "; null and undefined columns are omitted. */
export function formatRow(row: ResultRow): string {
  return Object.entries(row)
    .filter(([, value]) => value !== null && value !== undefined)
    .map(([key, value]) => `${key}: ${formatValue(value)}`)
    .join(", ");
}

export function formatRowsForPrompt(rows: ResultRow[], limit: number): string {
  const lines: string[] = [];
  rows.slice(0, limit).forEach((row, index) => {
    const rendered = formatRow(row);
    if (rendered.length > 0) {
      lines.push(`Result ${index + 1}: ${rendered}`);
    }
  });
  return lines.length > 0 ? lines.join("\n") : "No results found.";
}
