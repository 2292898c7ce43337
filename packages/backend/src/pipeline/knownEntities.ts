import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { KnownEntity } from "./types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_KNOWN_ENTITIES_PATH = resolve(__dirname, "../../data/known-entities.json");

const knownEntitiesSchema = z.array(
  z.object({
    id: z.string().min(1),
    label: z.string().min(1)
  })
);

export async function loadKnownEntities(path = DEFAULT_KNOWN_ENTITIES_PATH): Promise<KnownEntity[]> {
  const raw = await readFile(path, "utf8");
  return knownEntitiesSchema.parse(JSON.parse(raw));
}
