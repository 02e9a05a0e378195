import { describe, it, expect } from "vitest";
import { createTestDatabase, seedSeenItem, seedCycle } from "./db";
import { seenItems } from "../db/schema";

describe("Test Database Utilities", () => {
  it("should create an in-memory database with the schema applied", () => {
    const db = createTestDatabase();
    expect(db.select().from(seenItems).all()).toEqual([]);
  });

  it("should seed a seen item with overrides", () => {
    const db = createTestDatabase();
    const itemId = seedSeenItem(db, { itemId: "42", title: "Custom" });
    expect(itemId).toBe("42");
  });

  it("should seed a cycle", () => {
    const db = createTestDatabase();
    expect(seedCycle(db)).toBeGreaterThan(0);
  });
});
