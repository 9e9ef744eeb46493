import test from "node:test";
import assert from "node:assert/strict";
import { EXPANSION_TABLES, parseExpansionTables } from "@/search/tables";

test("bundled expansion tables load and are frozen", () => {
  assert.ok(Object.isFrozen(EXPANSION_TABLES));
  assert.ok(Object.isFrozen(EXPANSION_TABLES.synonyms));
  assert.deepEqual(EXPANSION_TABLES.leagues.nfl, ["football"]);
  assert.ok(EXPANSION_TABLES.fillers.some((f) => f.phrase === "who will win" && f.replacement === "winner"));
});

test("parseExpansionTables rejects malformed tables", () => {
  assert.throws(() => parseExpansionTables({ synonyms: {} }), /invalid_expansion_tables/);
  assert.throws(
    () => parseExpansionTables({ synonyms: { Moon: ["lunar"] }, leagues: {}, fillers: [], stemSuffixes: [] }),
    /not lower-case/,
  );
});
