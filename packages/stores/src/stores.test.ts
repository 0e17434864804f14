import test from "node:test";
import assert from "node:assert/strict";
import { AdapterError } from "@strata/utils";
import { MemoryCacheAdapter } from "./memory-cache.js";
import { MemoryVectorStore } from "./memory-vector-store.js";

test("cache entries expire at their deadline", async () => {
  let now = 1_000;
  const cache = new MemoryCacheAdapter<string>({ now: () => now });

  await cache.set("k", "v", 100);
  now = 1_099;
  assert.equal(await cache.get("k"), "v");

  now = 1_100;
  assert.equal(await cache.get("k"), undefined);
  assert.equal(cache.size, 0);
});

test("a full cache drops its oldest insertion", async () => {
  const cache = new MemoryCacheAdapter<number>({ maxEntries: 2 });

  await cache.set("a", 1, 60_000);
  await cache.set("b", 2, 60_000);
  await cache.set("a", 3, 60_000);
  await cache.set("c", 4, 60_000);

  assert.equal(await cache.get("b"), undefined);
  assert.equal(await cache.get("a"), 3);
  assert.equal(await cache.get("c"), 4);
});

test("vector queries rank by cosine similarity with ids breaking ties", async () => {
  const store = new MemoryVectorStore();
  await store.upsert("b", [1, 0], { label: "b" });
  await store.upsert("a", [2, 0], { label: "a" });
  await store.upsert("c", [0, 1], { label: "c" });

  const matches = await store.query([1, 0], 2);

  assert.deepEqual(matches, [
    { id: "a", score: 1, metadata: { label: "a" } },
    { id: "b", score: 1, metadata: { label: "b" } },
  ]);
  assert.deepEqual(await store.query([1, 0], 0), []);
});

test("vectors must share one dimensionality", async () => {
  const store = new MemoryVectorStore();
  await store.upsert("a", [1, 0], {});

  await assert.rejects(store.upsert("b", [1, 0, 0], {}), AdapterError);
  await assert.rejects(store.query([1], 1), AdapterError);
  await assert.rejects(store.upsert("c", [], {}), AdapterError);

  await store.delete("a");
  await store.upsert("d", [1, 0, 0], {});
  assert.equal(store.size, 1);
});
