import { getSearchConfig } from "@/config";
import { log } from "@/logger";
import { GammaError } from "@/gamma/errors";
import type { EventSource, GammaEvent } from "@/gamma/schema";
import { expandQuery, slugify } from "@/search/expand";
import { matchEvents } from "@/search/match";
import { renderEvents, type OutputOptions } from "@/commands/render";

export type SearchOptions = OutputOptions & {
  bulkLimit?: number;
};

async function lookupBySlug(source: EventSource, slug: string): Promise<GammaEvent[]> {
  try {
    return await source.listEvents({ slug, closed: false });
  } catch (error) {
    if (!(error instanceof GammaError)) throw error;
    log.debug({ slug, code: error.code }, "slug lookup failed, falling back to bulk match");
    return [];
  }
}

export async function search(source: EventSource, query: string, options: SearchOptions): Promise<string> {
  const variants = expandQuery(query);
  const direct = await lookupBySlug(source, slugify(query));
  if (direct.length > 0) {
    return renderEvents(`🔍 **Found: '${query}'**`, direct.slice(0, options.limit), options);
  }

  const bulkLimit = options.bulkLimit ?? getSearchConfig().bulkLimit;
  const events = await source.listEvents({ closed: false, limit: bulkLimit });
  const matches = matchEvents(variants, events);
  log.debug({ query, variants: variants.size, scanned: events.length, matched: matches.length }, "bulk match");

  const header = `🔍 **Search: '${query}'**`;
  if (matches.length === 0 && !options.json) {
    return [
      header,
      "",
      "No markets found.",
      "",
      "Tip: Try the full slug from the URL, e.g.:",
      "  marketscout event where-will-giannis-be-traded",
    ].join("\n");
  }
  return renderEvents(header, matches.slice(0, options.limit), options);
}

export function expand(query: string, options: Pick<OutputOptions, "json">): string {
  const variants = [...expandQuery(query)].sort();
  if (options.json) return JSON.stringify(variants, null, 2);
  return [`🧩 **Variants for '${query}'** (${variants.length})`, "", ...variants.map((v) => `  • ${v}`)].join("\n");
}
