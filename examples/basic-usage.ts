/**
 * Basic Usage Example
 *
 * Writes a few pages, reads them back and shows where they live on disk.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { openStore } from "@flatpages/sdk";
import { readFile, rm } from "node:fs/promises";

async function main() {
  // Setup: start from an empty content directory
  const root = "./examples-data/basic";
  await rm(root, { recursive: true, force: true });

  const store = openStore({
    root,
    filters: { upper: (value) => value.toUpperCase() },
  });

  // Plain objects are written with their fields sorted
  await store.put("/about/team", {
    title: "Our team",
    body: "We write software.\nMostly in the morning.",
    tags: ["company", "people"],
  });

  // Field lists keep the order they were given in
  await store.put("/", [
    ["title", "Home"],
    ["heading|upper", "welcome"],
    ["body", "Start here."],
  ]);

  console.log(`about/team -> ${store.keyToPath("/about/team")}`);
  console.log(await readFile(store.keyToPath("/about/team"), "utf-8"));

  // Tagged fields come back filtered
  console.log(await store.get("/"));

  console.log(`exists("missing"): ${await store.exists("missing")}`);
  console.log(`get("missing"): ${String(await store.get("missing"))}`);

  await rm(root, { recursive: true, force: true });
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
