import test from "node:test";
import assert from "node:assert/strict";
import {
  formatChange,
  formatEvent,
  formatMarket,
  formatPrice,
  formatTimeRemaining,
  formatVolume,
  rankMarkets,
} from "@/format";
import type { GammaEvent, GammaMarket } from "@/gamma/schema";

const NOW = new Date("2026-01-01T00:00:00Z");

function at(ms: number): string {
  return new Date(NOW.getTime() + ms).toISOString();
}

const HOUR = 3_600_000;
const DAY = 24 * HOUR;

test("formatPrice renders probabilities as percentages", () => {
  assert.equal(formatPrice(0.42), "42.0%");
  assert.equal(formatPrice("0.5"), "50.0%");
  assert.equal(formatPrice(null), "N/A");
  assert.equal(formatPrice("n/a"), "n/a");
});

test("formatVolume abbreviates thousands and millions", () => {
  assert.equal(formatVolume(2_500_000), "$2.5M");
  assert.equal(formatVolume("1500"), "$1.5K");
  assert.equal(formatVolume(42), "$42");
  assert.equal(formatVolume(undefined), "N/A");
});

test("formatChange uses arrows", () => {
  assert.equal(formatChange(0.05), "↑5.0%");
  assert.equal(formatChange(-0.1), "↓10.0%");
  assert.equal(formatChange(0), "→0%");
  assert.equal(formatChange(null), "");
  assert.equal(formatChange("bad"), "");
});

test("formatTimeRemaining buckets the remaining time", () => {
  assert.equal(formatTimeRemaining(at(45 * 60_000), NOW), "Ends in 45m");
  assert.equal(formatTimeRemaining(at(5.5 * HOUR), NOW), "Ends in 5h");
  assert.equal(formatTimeRemaining(at(DAY + 3 * HOUR), NOW), "Ends tomorrow");
  assert.equal(formatTimeRemaining(at(3 * DAY), NOW), "Ends in 3d");
  assert.equal(formatTimeRemaining(at(15 * DAY), NOW), "Ends in 2w");
  assert.equal(formatTimeRemaining(at(60 * DAY), NOW), "Mar 02, 2026");
  assert.equal(formatTimeRemaining(at(-HOUR), NOW), "Ended");
  assert.equal(formatTimeRemaining("", NOW), "");
  assert.equal(formatTimeRemaining("not a date", NOW), "");
});

test("formatMarket shows prices, spread, volume and link", () => {
  const market: GammaMarket = {
    question: "Will the Fed cut rates in March?",
    outcomePrices: '["0.25", "0.75"]',
    oneDayPriceChange: 0.05,
    bestBid: 0.24,
    bestAsk: 0.26,
    volume: "1500",
    volume24hr: 200,
    endDate: at(3 * DAY),
    oneWeekPriceChange: -0.1,
    liquidityNum: 2_500_000,
    slug: "fed-march",
  };
  assert.equal(
    formatMarket(market, true, NOW),
    [
      "📊 **Will the Fed cut rates in March?**",
      "   Yes: 25.0% (↑5.0%) | No: 75.0%",
      "   Spread: 2.0% (Bid: 24.0% / Ask: 26.0%)",
      "   Volume: $1.5K (24h: $200)",
      "   ⏰ Ends in 3d",
      "   📈 1w: ↓10.0% | 1m: N/A",
      "   💧 Liquidity: $2.5M",
      "   🔗 polymarket.com/event/fed-march",
    ].join("\n"),
  );
});

test("formatMarket without verbose skips history and liquidity", () => {
  const market: GammaMarket = { question: "Quiet market", oneWeekPriceChange: 0.1, liquidityNum: 10 };
  assert.equal(formatMarket(market, false, NOW), "📊 **Quiet market**");
});

test("rankMarkets sorts by Yes price and drops dead inactive markets", () => {
  const low: GammaMarket = { groupItemTitle: "Low", outcomePrices: ["0.1", "0.9"], volumeNum: 10 };
  const high: GammaMarket = { groupItemTitle: "High", outcomePrices: '["0.7","0.3"]', volumeNum: 10 };
  const dead: GammaMarket = { groupItemTitle: "Dead", outcomePrices: ["0.9", "0.1"], active: false, volumeNum: 0 };
  assert.deepEqual(
    rankMarkets([low, dead, high]).map((r) => r.market.groupItemTitle),
    ["High", "Low"],
  );
});

test("formatEvent lists ranked markets and truncates to ten", () => {
  const markets: GammaMarket[] = [];
  for (let i = 1; i <= 12; i++) {
    markets.push({ groupItemTitle: `Team ${i}`, outcomePrices: [String(i / 100), "0"], volumeNum: 1000 * i });
  }
  markets.push({ question: "Will nobody win the title this season at all?", outcomePrices: ["0", "1"] });

  const event: GammaEvent = {
    title: "NBA Champion",
    slug: "nba-champion",
    volume: 2_500_000,
    volume24hr: 0,
    markets,
  };
  const lines = formatEvent(event, false, NOW).split("\n");
  assert.equal(lines[0], "🎯 **NBA Champion**");
  assert.equal(lines[1], "   Volume: $2.5M");
  assert.equal(lines[2], "   Markets: 13");
  assert.equal(lines[3], "   • Team 12: 12.0% ($12.0K)");
  assert.equal(lines[12], "   • Team 3: 3.0% ($3.0K)");
  assert.equal(lines[13], "   ... and 3 more");
  assert.equal(lines[14], "   🔗 polymarket.com/event/nba-champion");
  assert.equal(lines.length, 15);

  const all = formatEvent(event, true, NOW).split("\n");
  assert.equal(all[all.length - 2], "   • Will nobody win the title this season at");
});
