import { z } from "zod";

const numeric = z.union([z.number(), z.string()]).nullish();
const text = z.string().nullish();

export const gammaMarketSchema = z
  .object({
    id: z.union([z.string(), z.number()]).nullish(),
    question: text,
    groupItemTitle: text,
    slug: text,
    market_slug: text,
    outcomePrices: z.union([z.string(), z.array(z.union([z.string(), z.number()]))]).nullish(),
    bestBid: numeric,
    bestAsk: numeric,
    volume: numeric,
    volumeNum: numeric,
    volume24hr: numeric,
    liquidity: numeric,
    liquidityNum: numeric,
    oneDayPriceChange: numeric,
    oneWeekPriceChange: numeric,
    oneMonthPriceChange: numeric,
    endDate: text,
    endDateIso: text,
    active: z.boolean().nullish(),
    closed: z.boolean().nullish(),
  })
  .passthrough();

export const gammaTagSchema = z
  .object({
    label: text,
  })
  .passthrough();

export const gammaEventSchema = z
  .object({
    id: z.union([z.string(), z.number()]).nullish(),
    slug: text,
    title: text,
    description: text,
    volume: numeric,
    volume24hr: numeric,
    endDate: text,
    featured: z.boolean().nullish(),
    closed: z.boolean().nullish(),
    markets: z.array(gammaMarketSchema).nullish(),
    tags: z.array(gammaTagSchema).nullish(),
  })
  .passthrough();

export const gammaEventListSchema = z.array(gammaEventSchema);

export type GammaMarket = z.infer<typeof gammaMarketSchema>;
export type GammaEvent = z.infer<typeof gammaEventSchema>;

export type EventQuery = {
  slug?: string;
  closed?: boolean;
  featured?: boolean;
  order?: "volume24hr" | "volume" | "liquidity";
  ascending?: boolean;
  limit?: number;
};

/** Anything that can list catalog events; the HTTP client in production, an in-memory list in tests. */
export interface EventSource {
  listEvents(query: EventQuery): Promise<GammaEvent[]>;
}
