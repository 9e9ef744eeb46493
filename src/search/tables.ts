import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
const TABLES_PATH = join(__dirname, "data", "expansions.json");

const phraseMapSchema = z.record(z.string().min(1), z.array(z.string().min(1)).min(1));

export const expansionTablesSchema = z.object({
  synonyms: phraseMapSchema,
  leagues: phraseMapSchema,
  fillers: z.array(
    z.object({
      phrase: z.string().min(1),
      replacement: z.string(),
    }),
  ),
  stemSuffixes: z.array(z.tuple([z.string().min(1), z.string()])),
});

export type ExpansionTables = z.infer<typeof expansionTablesSchema>;

function deepFreeze<T>(value: T): Readonly<T> {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

export function parseExpansionTables(raw: unknown): Readonly<ExpansionTables> {
  const parsed = expansionTablesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`invalid_expansion_tables: ${parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ")}`);
  }
  const tables = parsed.data;
  // Keys are matched against lower-cased queries.
  for (const map of [tables.synonyms, tables.leagues]) {
    for (const key of Object.keys(map)) {
      if (key !== key.toLowerCase()) throw new Error(`invalid_expansion_tables: key "${key}" is not lower-case`);
    }
  }
  return deepFreeze(tables);
}

export const EXPANSION_TABLES = parseExpansionTables(JSON.parse(readFileSync(TABLES_PATH, "utf-8")));
