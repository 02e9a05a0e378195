// pattern: Imperative Shell
import { eq, sql } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { seenItems, storeMeta } from "../db/schema";
import { StoreUnavailable, errorMessage } from "./errors";
import type { CommitEntry, SeenEntry, SeenSet } from "./types";

const SEEDED_KEY = "seeded_at";

export type CommitOptions = {
  /** Also records that the first-run seed has happened. */
  readonly markSeeded?: boolean;
};

export type StateStore = {
  readonly load: () => SeenSet;
  /**
   * Writes every entry or none of them. Re-committing a known id replaces
   * its fingerprint and disposition.
   */
  readonly commit: (
    entries: ReadonlyArray<CommitEntry>,
    options?: CommitOptions,
  ) => void;
  /** True once a seed commit has been recorded since the last reset. */
  readonly isSeeded: () => boolean;
  /** Forgets every seen item and the seed marker; returns the items removed. */
  readonly reset: () => number;
  readonly count: () => number;
};

export function createStateStore(db: AppDatabase): StateStore {
  return {
    load: () => {
      try {
        const rows = db
          .select({
            itemId: seenItems.itemId,
            fingerprint: seenItems.fingerprint,
          })
          .from(seenItems)
          .all();

        const seen = new Map<string, SeenEntry>();
        for (const row of rows) {
          seen.set(row.itemId, { fingerprint: row.fingerprint });
        }
        return seen;
      } catch (err) {
        throw new StoreUnavailable(
          `failed to load seen items: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    },

    commit: (entries, options) => {
      const markSeeded = options?.markSeeded ?? false;
      if (entries.length === 0 && !markSeeded) return;

      try {
        db.transaction((tx) => {
          const committedAt = new Date();
          if (markSeeded) {
            tx.insert(storeMeta)
              .values({
                key: SEEDED_KEY,
                value: committedAt.toISOString(),
                updatedAt: committedAt,
              })
              .onConflictDoNothing()
              .run();
          }
          for (const entry of entries) {
            tx.insert(seenItems)
              .values({
                itemId: entry.itemId,
                kind: entry.kind,
                title: entry.title,
                fingerprint: entry.fingerprint,
                disposition: entry.disposition,
                committedAt,
              })
              .onConflictDoUpdate({
                target: seenItems.itemId,
                set: {
                  title: entry.title,
                  fingerprint: entry.fingerprint,
                  disposition: entry.disposition,
                  committedAt,
                },
              })
              .run();
          }
        });
      } catch (err) {
        throw new StoreUnavailable(
          `failed to commit ${entries.length} seen items: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    },

    isSeeded: () => {
      try {
        const row = db
          .select({ key: storeMeta.key })
          .from(storeMeta)
          .where(eq(storeMeta.key, SEEDED_KEY))
          .get();
        return row !== undefined;
      } catch (err) {
        throw new StoreUnavailable(
          `failed to read seed marker: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    },

    reset: () => {
      try {
        return db.transaction((tx) => {
          tx.delete(storeMeta).where(eq(storeMeta.key, SEEDED_KEY)).run();
          return tx.delete(seenItems).run().changes;
        });
      } catch (err) {
        throw new StoreUnavailable(
          `failed to reset seen items: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    },

    count: () =>
      db
        .select({ count: sql<number>`count(*)` })
        .from(seenItems)
        .get()?.count ?? 0,
  };
}
