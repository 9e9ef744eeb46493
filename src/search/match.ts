import type { CatalogRecord, CatalogSubRecord, MaybeText } from "@/search/types";

function lower(text: MaybeText): string {
  return (text ?? "").toLowerCase();
}

function anyVariantIn(variants: readonly string[], fields: readonly string[]): boolean {
  for (const field of fields) {
    for (const variant of variants) {
      if (field.includes(variant)) return true;
    }
  }
  return false;
}

function recordMatches(variants: readonly string[], record: CatalogRecord): boolean {
  if (anyVariantIn(variants, [lower(record.slug), lower(record.title), lower(record.description)])) {
    return true;
  }
  for (const market of record.markets ?? []) {
    if (anyVariantIn(variants, [lower(market.question), lower(market.groupItemTitle)])) return true;
  }
  return false;
}

/**
 * Keep the records that contain any variant in their slug, title or
 * description, or in the question or label of one of their markets.
 * Input order is kept and each record appears once.
 */
export function matchEvents<T extends CatalogRecord>(variants: Iterable<string>, records: readonly T[]): T[] {
  const needles = [...new Set([...variants].map((v) => v.toLowerCase()))];
  return records.filter((record) => recordMatches(needles, record));
}

export function matchSlug<T extends CatalogRecord>(fragment: string, records: readonly T[]): T[] {
  const needle = fragment.toLowerCase();
  return records.filter((record) => lower(record.slug).includes(needle));
}

export function findMarket<T extends CatalogSubRecord>(outcome: string, markets: readonly T[]): T | undefined {
  const needle = outcome.toLowerCase();
  return markets.find(
    (market) => lower(market.groupItemTitle).includes(needle) || lower(market.question).includes(needle),
  );
}
