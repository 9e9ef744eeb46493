import { getSearchConfig } from "@/config";
import { log } from "@/logger";
import { formatEvent, formatMarket, outcomeName } from "@/format";
import { GammaNotFoundError } from "@/gamma/errors";
import type { EventSource, GammaEvent } from "@/gamma/schema";
import { extractSlugFromUrl } from "@/gamma/slug";
import { findMarket, matchSlug } from "@/search/match";
import type { OutputOptions } from "@/commands/render";

const OUTCOME_PREVIEW = 15;

export type LookupOptions = Omit<OutputOptions, "limit"> & {
  bulkLimit?: number;
};

function notFound(slug: string): string {
  return `❌ Event not found: ${slug}`;
}

/** Direct slug lookup; `null` when the API answers 404. */
async function fetchBySlug(source: EventSource, slug: string): Promise<GammaEvent[] | null> {
  try {
    return await source.listEvents({ slug });
  } catch (error) {
    if (error instanceof GammaNotFoundError) return null;
    throw error;
  }
}

export async function event(source: EventSource, slugOrUrl: string, options: LookupOptions): Promise<string> {
  const slug = extractSlugFromUrl(slugOrUrl);
  let events = await fetchBySlug(source, slug);
  if (events === null) return notFound(slug);

  if (events.length === 0) {
    log.debug({ slug }, "no exact slug, trying partial match");
    const bulkLimit = options.bulkLimit ?? getSearchConfig().bulkLimit;
    events = matchSlug(slug, await source.listEvents({ closed: false, limit: bulkLimit }));
  }

  const [found] = events;
  if (!found) {
    return [notFound(slug), "", "Tip: Search for it first:", `  marketscout search ${slug.split("-")[0]}`].join("\n");
  }
  if (options.json) return JSON.stringify(found, null, 2);
  return formatEvent(found, true, options.now);
}

export async function market(
  source: EventSource,
  slugOrUrl: string,
  outcome: string | undefined,
  options: LookupOptions,
): Promise<string> {
  const slug = extractSlugFromUrl(slugOrUrl);
  const events = await fetchBySlug(source, slug);
  const [found] = events ?? [];
  if (!found) return notFound(slug);

  const markets = found.markets ?? [];
  if (!outcome) {
    if (options.json) return JSON.stringify(markets, null, 2);
    const lines = [`🎯 **${found.title ?? "Unknown Event"}**`, ""];
    for (const m of markets) lines.push(formatMarket(m, true, options.now), "");
    return lines.join("\n");
  }

  const hit = findMarket(outcome, markets);
  if (hit) {
    return options.json ? JSON.stringify(hit, null, 2) : formatMarket(hit, true, options.now);
  }

  return [
    `❌ Outcome '${outcome}' not found`,
    "",
    "Available outcomes:",
    ...markets.slice(0, OUTCOME_PREVIEW).map((m) => `  • ${outcomeName(m)}`),
  ].join("\n");
}
