import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ---------- Tables ----------

export const seenItems = sqliteTable(
  "seen_items",
  {
    itemId: text("item_id").primaryKey(),
    kind: text("kind").notNull(),
    title: text("title").notNull(),
    fingerprint: text("fingerprint").notNull(),
    disposition: text("disposition", { enum: ["announced", "skipped"] })
      .notNull()
      .default("announced"),
    committedAt: integer("committed_at", { mode: "timestamp" })
      .notNull()
      .default(sql`(unixepoch())`),
  },
  (table) => ({
    committedAtIdx: index("seen_items_committed_at_idx").on(table.committedAt),
  }),
);

export const storeMeta = sqliteTable("store_meta", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
  updatedAt: integer("updated_at", { mode: "timestamp" })
    .notNull()
    .default(sql`(unixepoch())`),
});

export const cycles = sqliteTable("cycles", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  startedAt: integer("started_at", { mode: "timestamp" }).notNull(),
  finishedAt: integer("finished_at", { mode: "timestamp" }).notNull(),
  outcome: text("outcome", { enum: ["completed", "failed", "aborted"] }).notNull(),
  failedPhase: text("failed_phase", { enum: ["fetching", "committing"] }),
  newCount: integer("new_count").notNull().default(0),
  sentCount: integer("sent_count").notNull().default(0),
  failedCount: integer("failed_count").notNull().default(0),
  error: text("error"),
});
