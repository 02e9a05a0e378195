import { describe, it, expect } from "vitest";
import { diffSnapshot, fingerprintItem } from "./diff";
import { makeItem } from "../test-utils/db";
import type { SeenSet, Snapshot } from "./types";

function snapshotOf(...items: Snapshot["items"]): Snapshot {
  return { items, fetchedAt: new Date("2026-03-02T00:00:00Z") };
}

const t1 = new Date("2026-03-01T10:00:00Z");
const t2 = new Date("2026-03-01T11:00:00Z");
const t3 = new Date("2026-03-01T12:00:00Z");

describe("diffSnapshot", () => {
  it("should return every item when nothing has been seen", () => {
    const item = makeItem({ id: "1" });
    expect(diffSnapshot(snapshotOf(item), new Map())).toEqual([item]);
  });

  it("should return an empty list when every item is already seen", () => {
    const seen: SeenSet = new Map([
      ["1", { fingerprint: "x" }],
      ["2", { fingerprint: "y" }],
    ]);
    const result = diffSnapshot(
      snapshotOf(makeItem({ id: "1" }), makeItem({ id: "2" })),
      seen,
    );
    expect(result).toEqual([]);
  });

  it("should order new items by addedAt ascending regardless of fetch order", () => {
    const a = makeItem({ id: "a", addedAt: t1 });
    const b = makeItem({ id: "b", addedAt: t2 });
    const c = makeItem({ id: "c", addedAt: t3 });

    const result = diffSnapshot(snapshotOf(c, a, b), new Map());

    expect(result.map((i) => i.id)).toEqual(["a", "b", "c"]);
  });

  it("should break addedAt ties by id so the order is deterministic", () => {
    const x = makeItem({ id: "20", addedAt: t1 });
    const y = makeItem({ id: "10", addedAt: t1 });

    expect(diffSnapshot(snapshotOf(x, y), new Map()).map((i) => i.id)).toEqual([
      "10",
      "20",
    ]);
    expect(diffSnapshot(snapshotOf(y, x), new Map()).map((i) => i.id)).toEqual([
      "10",
      "20",
    ]);
  });

  it("should order numeric ids within one second by value, not as strings", () => {
    const items = ["100", "9", "10"].map((id) => makeItem({ id, addedAt: t1 }));

    expect(diffSnapshot(snapshotOf(...items), new Map()).map((i) => i.id)).toEqual([
      "9",
      "10",
      "100",
    ]);
  });

  it("should fall back to a string compare when an id is not numeric", () => {
    const items = ["b7", "10", "a9"].map((id) => makeItem({ id, addedAt: t1 }));

    expect(diffSnapshot(snapshotOf(...items), new Map()).map((i) => i.id)).toEqual([
      "10",
      "a9",
      "b7",
    ]);
  });

  it("should never return a seen id whatever position it has in the snapshot", () => {
    const seen: SeenSet = new Map([["2", { fingerprint: "f" }]]);
    const one = makeItem({ id: "1", addedAt: t1 });
    const two = makeItem({ id: "2", addedAt: t2 });
    const three = makeItem({ id: "3", addedAt: t3 });
    const orders = [
      [one, two, three],
      [three, two, one],
      [two, one, three],
      [two, three, one],
    ];

    for (const order of orders) {
      const ids = diffSnapshot(snapshotOf(...order), seen).map((i) => i.id);
      expect(ids).toEqual(["1", "3"]);
    }
  });

  it("should collapse duplicate ids in one snapshot to a single candidate", () => {
    const first = makeItem({ id: "5", title: "First Copy" });
    const second = makeItem({ id: "5", title: "Second Copy" });

    expect(diffSnapshot(snapshotOf(first, second), new Map())).toEqual([first]);
  });

  it("should not re-announce a seen item whose metadata changed under the identity policy", () => {
    const original = makeItem({ id: "9", title: "Old Title" });
    const edited = makeItem({ id: "9", title: "New Title" });
    const seen: SeenSet = new Map([["9", { fingerprint: fingerprintItem(original) }]]);

    expect(diffSnapshot(snapshotOf(edited), seen, "identity")).toEqual([]);
  });

  it("should re-announce a seen item whose metadata changed under the metadata policy", () => {
    const original = makeItem({ id: "9", title: "Old Title" });
    const edited = makeItem({ id: "9", title: "New Title" });
    const seen: SeenSet = new Map([["9", { fingerprint: fingerprintItem(original) }]]);

    expect(diffSnapshot(snapshotOf(edited), seen, "metadata")).toEqual([edited]);
    expect(diffSnapshot(snapshotOf(original), seen, "metadata")).toEqual([]);
  });
});

describe("fingerprintItem", () => {
  it("should ignore fields an announcement does not show", () => {
    const a = makeItem({ addedAt: t1, library: "Movies" });
    const b = makeItem({ addedAt: t2, library: "Films" });
    expect(fingerprintItem(a)).toBe(fingerprintItem(b));
  });

  it("should change when the artwork changes", () => {
    const a = makeItem({ artwork: "/thumb/1" });
    const b = makeItem({ artwork: "/thumb/2" });
    expect(fingerprintItem(a)).not.toBe(fingerprintItem(b));
  });
});
