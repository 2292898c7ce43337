export type TagKind = "label" | "relationship";

export const ENTITY_LABEL = "Entity";
export const PAGE_LABEL = "Page";
export const MENTIONS_RELATIONSHIP = "MENTIONS";

const reservedTags: Record<TagKind, ReadonlySet<string>> = {
  label: new Set([ENTITY_LABEL, PAGE_LABEL]),
  relationship: new Set([MENTIONS_RELATIONSHIP])
};

const SAFE_TAG_PATTERN = /^[A-Za-z0-9_]+$/;

export class UnsafeTagError extends Error {
  constructor(tag: string) {
    super(`Refusing to interpolate unsanitized tag into Cypher: ${JSON.stringify(tag)}`);
    this.name = "UnsafeTagError";
  }
}

/**
 * Canonical entity identifier: trimmed, inner whitespace collapsed, upper-cased.
 * `normalize(normalize(x)) === normalize(x)`.
 */
export function normalize(rawId: string): string {
  return rawId.trim().replace(/\s+/g, " ").toUpperCase();
}

/**
 * Makes a label or relationship type safe to place in query text.
 *
 * Labels keep their casing and lose every non-alphanumeric character.
 * Relationship types treat whitespace and hyphens as word separators, so
 * "carries sensor", "carries-sensor" and "carries_sensor" all become
 * `CARRIES_SENSOR`.
 *
 * Returns an empty string when nothing usable remains or when the tag is
 * reserved for provenance bookkeeping. Callers must skip the item then.
 */
export function sanitizeTag(rawTag: string, kind: TagKind): string {
  const sanitized =
    kind === "label"
      ? rawTag.replace(/[^A-Za-z0-9]/g, "")
      : rawTag
          .trim()
          .replace(/[\s-]+/g, "_")
          .replace(/[^A-Za-z0-9_]/g, "")
          .toUpperCase()
          .replace(/_+/g, "_")
          .replace(/^_|_$/g, "");

  if (reservedTags[kind].has(sanitized)) {
    return "";
  }
  return sanitized;
}

export function isSafeTag(tag: string): boolean {
  return SAFE_TAG_PATTERN.test(tag);
}

export function assertSafeTag(tag: string): string {
  if (!isSafeTag(tag)) {
    throw new UnsafeTagError(tag);
  }
  return tag;
}
