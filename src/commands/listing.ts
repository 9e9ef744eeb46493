import { log } from "@/logger";
import type { EventSource, GammaEvent } from "@/gamma/schema";
import { renderEvents, type OutputOptions } from "@/commands/render";

const CATEGORY_SCAN_LIMIT = 100;

export const CATEGORIES: Readonly<Record<string, readonly string[]>> = Object.freeze({
  politics: ["politics", "election", "trump", "biden", "congress"],
  crypto: ["crypto", "bitcoin", "ethereum", "btc", "eth"],
  sports: ["sports", "nba", "nfl", "mlb", "soccer"],
  tech: ["tech", "ai", "apple", "google", "microsoft"],
  entertainment: ["entertainment", "movie", "oscar", "grammy"],
  science: ["science", "space", "nasa", "climate"],
  business: ["business", "fed", "interest", "stock", "market"],
});

export async function trending(source: EventSource, options: OutputOptions): Promise<string> {
  const events = await source.listEvents({
    order: "volume24hr",
    ascending: false,
    closed: false,
    limit: options.limit,
  });
  return renderEvents("🔥 **Trending on Polymarket**", events, options);
}

export async function featured(source: EventSource, options: OutputOptions): Promise<string> {
  const events = await source.listEvents({ closed: false, featured: true, limit: options.limit });
  if (events.length > 0) return renderEvents("⭐ **Featured Markets**", events, options);

  log.debug({}, "no featured events, falling back to volume order");
  const byVolume = await source.listEvents({
    order: "volume",
    ascending: false,
    closed: false,
    limit: options.limit,
  });
  return renderEvents("⭐ **Featured Markets**", byVolume, options, ["(Showing highest volume markets)", ""]);
}

function titleCase(text: string): string {
  return text.toLowerCase().replace(/\b[a-z]/g, (c) => c.toUpperCase());
}

export function categoryTags(name: string): readonly string[] {
  const key = name.toLowerCase();
  return CATEGORIES[key] ?? [key];
}

function inCategory(event: GammaEvent, tags: readonly string[]): boolean {
  const title = (event.title ?? "").toLowerCase();
  const labels = (event.tags ?? []).map((t) => (t.label ?? "").toLowerCase()).join(" ");
  return tags.some((tag) => title.includes(tag) || labels.includes(tag));
}

export async function category(source: EventSource, name: string, options: OutputOptions): Promise<string> {
  const tags = categoryTags(name);
  const events = await source.listEvents({
    closed: false,
    limit: CATEGORY_SCAN_LIMIT,
    order: "volume24hr",
    ascending: false,
  });
  const matches = events.filter((event) => inCategory(event, tags)).slice(0, options.limit);
  const header = `📁 **Category: ${titleCase(name)}**`;

  if (matches.length === 0 && !options.json) {
    return [
      header,
      "",
      `No markets found for '${name}'`,
      "",
      `Available categories: ${Object.keys(CATEGORIES).join(", ")}`,
    ].join("\n");
  }
  return renderEvents(header, matches, options);
}
