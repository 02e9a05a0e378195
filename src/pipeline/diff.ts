// pattern: Functional Core
import { createHash } from "node:crypto";
import type { DiffPolicy, Item, SeenSet, Snapshot } from "./types";

/**
 * Digest of the item fields an announcement shows. Used by the `metadata`
 * policy to spot edits to already-announced items.
 */
export function fingerprintItem(item: Item): string {
  return createHash("sha256")
    .update(
      JSON.stringify([
        item.kind,
        item.title,
        item.parent?.title ?? null,
        item.artwork,
      ]),
    )
    .digest("hex");
}

const NUMERIC_ID = /^[0-9]+$/;

// Plex ratingKeys are increasing integers; compare them by value so "9"
// precedes "10". Other ids fall back to a string compare.
function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  if (NUMERIC_ID.test(a) && NUMERIC_ID.test(b)) {
    const x = a.replace(/^0+(?=.)/, "");
    const y = b.replace(/^0+(?=.)/, "");
    if (x.length !== y.length) return x.length - y.length;
  }
  return a < b ? -1 : 1;
}

function compareItems(a: Item, b: Item): number {
  const byTime = a.addedAt.getTime() - b.addedAt.getTime();
  if (byTime !== 0) return byTime;
  return compareIds(a.id, b.id);
}

/**
 * Returns the snapshot items that still need announcing, oldest first.
 *
 * Under `identity` an id in `seen` is never returned again. Under `metadata`
 * it is returned when its fingerprint no longer matches the stored one.
 * Ties on addedAt are broken by id so the order does not depend on the order
 * the source reported items in.
 */
export function diffSnapshot(
  snapshot: Snapshot,
  seen: SeenSet,
  policy: DiffPolicy = "identity",
): Array<Item> {
  const candidates = new Map<string, Item>();

  for (const item of snapshot.items) {
    if (candidates.has(item.id)) continue;

    const entry = seen.get(item.id);
    if (entry === undefined) {
      candidates.set(item.id, item);
      continue;
    }

    if (policy === "metadata" && entry.fingerprint !== fingerprintItem(item)) {
      candidates.set(item.id, item);
    }
  }

  return [...candidates.values()].sort(compareItems);
}
