import test from "node:test";
import assert from "node:assert/strict";
import { category, categoryTags, featured, trending } from "@/commands/listing";
import { formatEvent } from "@/format";
import type { GammaEvent } from "@/gamma/schema";
import { FakeSource, gammaEvent } from "./fake-source";

const NOW = new Date("2026-01-01T00:00:00Z");

test("trending asks for open events by 24h volume", async () => {
  const hot = gammaEvent("hot", "Hot Event");
  const source = new FakeSource(() => [hot]);
  const out = await trending(source, { limit: 3, now: NOW });
  assert.deepEqual(source.queries, [{ order: "volume24hr", ascending: false, closed: false, limit: 3 }]);
  assert.equal(out, ["🔥 **Trending on Polymarket**", "", formatEvent(hot, false, NOW), ""].join("\n"));
});

test("featured falls back to highest volume", async () => {
  const big = gammaEvent("big", "Big Event");
  const source = new FakeSource((q) => (q.featured ? [] : [big]));
  const out = await featured(source, { limit: 2, now: NOW });
  assert.deepEqual(source.queries[1], { order: "volume", ascending: false, closed: false, limit: 2 });
  assert.equal(
    out,
    ["⭐ **Featured Markets**", "", "(Showing highest volume markets)", "", formatEvent(big, false, NOW), ""].join("\n"),
  );
});

test("category matches titles and tag labels", async () => {
  const byTitle = gammaEvent("btc", "Bitcoin above 100k?");
  const byTag: GammaEvent = { slug: "sec", title: "SEC approves new fund?", tags: [{ label: "Crypto" }] };
  const neither = gammaEvent("oscars", "Best Picture");
  const source = new FakeSource(() => [byTitle, neither, byTag]);

  const out = await category(source, "crypto", { limit: 5, json: true });

  assert.deepEqual(source.queries, [{ closed: false, limit: 100, order: "volume24hr", ascending: false }]);
  assert.deepEqual(
    JSON.parse(out).map((e: { slug: string }) => e.slug),
    ["btc", "sec"],
  );
});

test("category without matches lists the known categories", async () => {
  const out = await category(new FakeSource(() => []), "weather", { limit: 5 });
  assert.equal(
    out,
    [
      "📁 **Category: Weather**",
      "",
      "No markets found for 'weather'",
      "",
      "Available categories: politics, crypto, sports, tech, entertainment, science, business",
    ].join("\n"),
  );
});

test("categoryTags falls back to the name itself", () => {
  assert.deepEqual(categoryTags("Sports"), ["sports", "nba", "nfl", "mlb", "soccer"]);
  assert.deepEqual(categoryTags("weather"), ["weather"]);
});
