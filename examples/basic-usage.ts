/**
 * Basic Usage Example
 *
 * Demonstrates the collections over an in-memory backend, one call at a time.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { z } from "zod";
import { MemoryStorage, codecs, naturalOrder, openStore } from "@lazykv/sdk";

const Profile = z.object({
  name: z.string(),
  tags: z.array(z.string()),
});

function main(): void {
  const storage = new MemoryStorage();

  // Open store
  console.log("📂 Opening store...");
  let store = openStore({ storage });

  // WRITE: everything inside transact reaches storage when the call returns
  console.log("\n✏️  Writing collections...");
  store.transact(() => {
    const profiles = store.iterableMap("p", { key: codecs.string, value: codecs.json(Profile) });
    profiles.insert("alice", { name: "Alice", tags: ["admin"] });
    profiles.insert("bob", { name: "Bob", tags: [] });

    const scores = store.treeMap("s", { key: codecs.u32, value: codecs.string, compare: naturalOrder });
    for (const [score, who] of [[70, "bob"], [95, "alice"], [82, "carol"]] as const) {
      scores.insert(score, who);
    }

    store.lazy("visits", { value: codecs.u64 }).set(1n);
  });
  store.close();
  console.log(`✅ Wrote ${storage.size} storage keys`);

  // READ: a fresh store sees what the previous call flushed
  console.log("\n📖 Reading back...");
  store = openStore({ storage });
  const profiles = store.iterableMap("p", { key: codecs.string, value: codecs.json(Profile) });
  const scores = store.treeMap("s", { key: codecs.u32, value: codecs.string, compare: naturalOrder });
  const visits = store.lazy("visits", { value: codecs.u64 });

  for (const [id, profile] of profiles) {
    console.log(`   ${id}: ${profile.name} [${profile.tags.join(", ")}]`);
  }
  console.log(`   best score: ${JSON.stringify(scores.max())}`);
  console.log(`   scores from 80: ${[...scores.range({ from: 80 })].map(([s]) => s).join(", ")}`);

  // UPDATE: in-place mutation is written back on return
  console.log("\n✏️  Updating...");
  store.transact(() => {
    profiles.getMut("bob")?.tags.push("reviewer");
    visits.update((n) => n + 1n);
  });
  console.log(`✅ bob is now ${JSON.stringify(profiles.get("bob"))}, visits ${visits.get()}`);

  // ABORT: a throwing call leaves storage untouched
  console.log("\n🗑️  Aborting a call...");
  try {
    store.transact(() => {
      profiles.remove("alice");
      throw new Error("changed my mind");
    });
  } catch (err) {
    console.log(`✅ Rolled back: ${err instanceof Error ? err.message : String(err)}`);
  }
  console.log(`   alice still present: ${profiles.contains("alice")}`);

  // Final stats
  console.log("\n📊 Final stats:");
  const stats = store.stats();
  console.log(`   Containers: ${stats.containers}`);
  console.log(`   Cache hit rate: ${(stats.cache.hitRate * 100).toFixed(1)}%`);

  store.close();
  console.log("\n✅ Example completed successfully!");
}

main();
