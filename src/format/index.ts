import type { GammaEvent, GammaMarket } from "@/gamma/schema";
import { parseJsonList } from "@/utils/parse-json";

const EVENT_URL = "polymarket.com/event";
const DEFAULT_MARKET_ROWS = 10;
const HOUR_MS = 3_600_000;
const DAY_MS = 86_400_000;

type Numeric = string | number | null | undefined;

export function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string" || !value.trim()) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

export function formatPrice(price: Numeric): string {
  if (price === null || price === undefined) return "N/A";
  const n = toNumber(price);
  if (n === null) return String(price);
  return `${(n * 100).toFixed(1)}%`;
}

export function formatVolume(volume: Numeric): string {
  if (volume === null || volume === undefined) return "N/A";
  const v = toNumber(volume);
  if (v === null) return String(volume);
  if (v >= 1_000_000) return `$${(v / 1_000_000).toFixed(1)}M`;
  if (v >= 1_000) return `$${(v / 1_000).toFixed(1)}K`;
  return `$${v.toFixed(0)}`;
}

export function formatChange(change: Numeric): string {
  const c = toNumber(change);
  if (c === null) return "";
  const pct = c * 100;
  if (pct > 0) return `↑${pct.toFixed(1)}%`;
  if (pct < 0) return `↓${Math.abs(pct).toFixed(1)}%`;
  return "→0%";
}

export function formatTimeRemaining(endDate: string | null | undefined, now: Date = new Date()): string {
  if (!endDate) return "";
  const end = new Date(endDate);
  if (Number.isNaN(end.getTime())) return "";

  const delta = end.getTime() - now.getTime();
  const days = Math.floor(delta / DAY_MS);
  if (days < 0) return "Ended";
  if (days === 0) {
    const hours = Math.floor(delta / HOUR_MS);
    if (hours === 0) return `Ends in ${Math.floor(delta / 60_000)}m`;
    return `Ends in ${hours}h`;
  }
  if (days === 1) return "Ends tomorrow";
  if (days < 7) return `Ends in ${days}d`;
  if (days < 30) return `Ends in ${Math.floor(days / 7)}w`;
  return end.toLocaleDateString("en-US", { month: "short", day: "2-digit", year: "numeric", timeZone: "UTC" });
}

function volumeLine(volume: Numeric, volume24h: Numeric): string {
  let line = `   Volume: ${formatVolume(volume)}`;
  const day = toNumber(volume24h);
  if (day !== null && day > 0) line += ` (24h: ${formatVolume(volume24h)})`;
  return line;
}

function yesPrice(market: GammaMarket): number {
  const [first] = parseJsonList(market.outcomePrices);
  return toNumber(first) ?? 0;
}

export function outcomeName(market: GammaMarket): string {
  return market.groupItemTitle || (market.question ?? "").slice(0, 40);
}

export function formatMarket(market: GammaMarket, verbose = false, now: Date = new Date()): string {
  const lines: string[] = [];
  lines.push(`📊 **${market.question || "Unknown"}**`);

  const prices = parseJsonList(market.outcomePrices);
  if (prices.length >= 2) {
    const dayChange = formatChange(market.oneDayPriceChange);
    const changeStr = dayChange ? ` (${dayChange})` : "";
    lines.push(`   Yes: ${formatPrice(toNumber(prices[0]))}${changeStr} | No: ${formatPrice(toNumber(prices[1]))}`);
  }

  const bid = toNumber(market.bestBid);
  const ask = toNumber(market.bestAsk);
  if (bid !== null && ask !== null && ask - bid > 0) {
    lines.push(`   Spread: ${((ask - bid) * 100).toFixed(1)}% (Bid: ${formatPrice(bid)} / Ask: ${formatPrice(ask)})`);
  }

  const volume = market.volume || market.volumeNum;
  if (volume) lines.push(volumeLine(volume, market.volume24hr));

  const timeLeft = formatTimeRemaining(market.endDate || market.endDateIso, now);
  if (timeLeft) lines.push(`   ⏰ ${timeLeft}`);

  if (verbose) {
    const week = formatChange(market.oneWeekPriceChange);
    const month = formatChange(market.oneMonthPriceChange);
    if (week || month) lines.push(`   📈 1w: ${week || "N/A"} | 1m: ${month || "N/A"}`);

    const liquidity = market.liquidityNum || market.liquidity;
    if (liquidity) lines.push(`   💧 Liquidity: ${formatVolume(liquidity)}`);
  }

  const slug = market.slug || market.market_slug;
  if (slug) lines.push(`   🔗 ${EVENT_URL}/${slug}`);

  return lines.join("\n");
}

/** Markets worth listing under an event, highest Yes price first. */
export function rankMarkets(markets: readonly GammaMarket[]): Array<{ market: GammaMarket; price: number }> {
  return markets
    .filter((m) => !(m.active === false && (toNumber(m.volumeNum ?? 0) ?? 0) === 0))
    .map((market) => ({ market, price: yesPrice(market) }))
    .sort((a, b) => b.price - a.price);
}

export function formatEvent(event: GammaEvent, showAllMarkets = false, now: Date = new Date()): string {
  const lines: string[] = [];
  lines.push(`🎯 **${event.title || "Unknown Event"}**`);

  if (event.volume) lines.push(volumeLine(event.volume, event.volume24hr));

  const timeLeft = formatTimeRemaining(event.endDate, now);
  if (timeLeft) lines.push(`   ⏰ ${timeLeft}`);

  const markets = event.markets ?? [];
  if (markets.length > 0) {
    const ranked = rankMarkets(markets);
    lines.push(`   Markets: ${ranked.length}`);

    const shown = showAllMarkets ? ranked.length : Math.min(DEFAULT_MARKET_ROWS, ranked.length);
    for (const { market, price } of ranked.slice(0, shown)) {
      const name = outcomeName(market);
      if (price > 0) {
        const dayChange = formatChange(market.oneDayPriceChange);
        const changeStr = dayChange ? ` ${dayChange}` : "";
        lines.push(`   • ${name}: ${formatPrice(price)}${changeStr} (${formatVolume(market.volumeNum ?? 0)})`);
      } else {
        lines.push(`   • ${name}`);
      }
    }

    if (ranked.length > shown) lines.push(`   ... and ${ranked.length - shown} more`);
  }

  if (event.slug) lines.push(`   🔗 ${EVENT_URL}/${event.slug}`);

  return lines.join("\n");
}
