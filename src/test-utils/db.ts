import pino from "pino";
import { createDatabase, ensureSchema } from "../db";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import { cycles, seenItems } from "../db/schema";
import { createCallerFactory } from "../api/trpc";
import { appRouter } from "../api/router";
import { createStateStore } from "../pipeline/state-store";
import type { Item } from "../pipeline/types";

/**
 * Creates an in-memory SQLite test database with the schema applied.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  ensureSchema(db);
  return db;
}

/**
 * Seeds one SeenSet row with optional field overrides.
 * @returns The seeded item id.
 */
export function seedSeenItem(
  db: AppDatabase,
  overrides?: Partial<typeof seenItems.$inferInsert>,
): string {
  const result = db
    .insert(seenItems)
    .values({
      itemId: `item-${Date.now()}-${Math.random()}`,
      kind: "movie",
      title: "Seeded Movie (2020)",
      fingerprint: "seeded",
      disposition: "announced",
      ...overrides,
    })
    .returning({ itemId: seenItems.itemId })
    .get();

  return result.itemId;
}

/**
 * Seeds one cycle history row with optional field overrides.
 * @returns The id of the inserted cycle.
 */
export function seedCycle(
  db: AppDatabase,
  overrides?: Partial<typeof cycles.$inferInsert>,
): number {
  const result = db
    .insert(cycles)
    .values({
      startedAt: new Date("2026-01-01T00:00:00Z"),
      finishedAt: new Date("2026-01-01T00:00:05Z"),
      outcome: "completed",
      ...overrides,
    })
    .returning({ id: cycles.id })
    .get();

  return result.id;
}

/**
 * Builds a well-formed movie Item; override any field.
 */
export function makeItem(overrides?: Partial<Item>): Item {
  return {
    id: "100",
    kind: "movie",
    title: "Test Movie (2021)",
    library: "Movies",
    addedAt: new Date("2026-03-01T12:00:00Z"),
    parent: null,
    artwork: null,
    year: 2021,
    seasonNumber: null,
    episodeNumber: null,
    ...overrides,
  };
}

/**
 * Creates a default AppConfig suitable for testing.
 */
export function createTestConfig(): AppConfig {
  return {
    plex: {
      url: "http://plex.test:32400",
      token: "test-token",
      libraries: [
        { name: "Movies", kind: "movie", enabled: true },
        { name: "TV Shows", kind: "episode", enabled: true },
      ],
      requestTimeoutMs: 15000,
      maxConcurrency: 2,
    },
    discord: {
      webhookUrl: "https://discord.test/api/webhooks/1/test-secret",
      testing: { enabled: false },
      embed: {
        colours: {},
        emotes: {},
        overflowFooter: "...and more",
      },
    },
    schedule: {
      poll: "*/15 * * * *",
      runOnStart: false,
      errorBackoffSeconds: 60,
      maxConsecutiveFailures: 0,
    },
    dispatch: {
      maxRetries: 2,
      baseDelayMs: 100,
      maxDelayMs: 1000,
      requestTimeoutMs: 10000,
    },
    announce: {
      bootstrap: "announce",
      policy: "identity",
    },
    monitoring: {},
  };
}

/**
 * Creates a typed tRPC caller backed by `db` for router tests.
 */
export function createTestCaller(
  db: AppDatabase,
  configOverrides?: Partial<AppConfig>,
) {
  const createCaller = createCallerFactory(appRouter);
  const config = { ...createTestConfig(), ...configOverrides };
  const logger = pino({ level: "silent" });

  return createCaller({ db, store: createStateStore(db), config, logger });
}
