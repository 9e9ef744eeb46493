import { EXPANSION_TABLES, type ExpansionTables } from "@/search/tables";

function normalize(query: string): string {
  return query.toLowerCase().trim();
}

function words(normalized: string): string[] {
  return normalized.split(" ").filter(Boolean);
}

export function slugify(query: string): string {
  return normalize(query).replaceAll(" ", "-");
}

function addSubstitutions(
  out: Set<string>,
  query: string,
  key: string,
  replacements: readonly string[],
): void {
  for (const replacement of replacements) {
    out.add(replacement);
    out.add(query.replaceAll(key, replacement));
  }
}

function addSynonyms(out: Set<string>, query: string, tables: ExpansionTables): void {
  for (const [phrase, synonyms] of Object.entries(tables.synonyms)) {
    if (query.includes(phrase)) addSubstitutions(out, query, phrase, synonyms);
  }
}

function addLeagues(out: Set<string>, query: string, tables: ExpansionTables): void {
  for (const [league, sports] of Object.entries(tables.leagues)) {
    if (query.includes(league)) addSubstitutions(out, query, league, sports);
    for (const sport of sports) {
      if (query.includes(sport)) out.add(league);
    }
  }
}

function addStems(out: Set<string>, query: string, tables: ExpansionTables): void {
  for (const word of words(query)) {
    if (word.length < 4) continue;
    for (const [suffix, replacement] of tables.stemSuffixes) {
      if (!word.endsWith(suffix)) continue;
      const stem = word.slice(0, word.length - suffix.length) + replacement;
      if (stem.length >= 3) out.add(stem);
    }
  }
}

function addWords(out: Set<string>, query: string): void {
  const parts = words(query);
  if (parts.length < 2) return;
  for (const word of parts) {
    if (word.length >= 3) out.add(word);
  }
}

function addStrippedFillers(out: Set<string>, query: string, tables: ExpansionTables): void {
  for (const { phrase, replacement } of tables.fillers) {
    if (!query.includes(phrase)) continue;
    const stripped = query.replaceAll(phrase, replacement).trim();
    if (stripped) out.add(stripped);
  }
}

/**
 * Expand a free-text query into the set of lower-cased variants used for
 * substring matching. Every rule reads the normalized query only, so the
 * expansion is one level deep.
 */
export function expandQuery(query: string, tables: ExpansionTables = EXPANSION_TABLES): Set<string> {
  const normalized = normalize(query);
  const expanded = new Set<string>([normalized, slugify(normalized)]);

  addSynonyms(expanded, normalized, tables);
  addLeagues(expanded, normalized, tables);
  addStems(expanded, normalized, tables);
  addWords(expanded, normalized);
  addStrippedFillers(expanded, normalized, tables);

  return expanded;
}
