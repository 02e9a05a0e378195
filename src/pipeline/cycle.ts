import type { Logger } from "pino";
import { PipelineError, errorMessage } from "./errors";
import { diffSnapshot, fingerprintItem } from "./diff";
import type { Dispatcher, DispatchFailureReason } from "./dispatcher";
import type { SnapshotFetcher } from "./fetcher";
import type { StateStore } from "./state-store";
import type {
  CommitEntry,
  DiffPolicy,
  Disposition,
  Item,
  NotificationPayload,
  SeenSet,
  Snapshot,
} from "./types";

export type CycleState =
  | "idle"
  | "fetching"
  | "diffing"
  | "dispatching"
  | "committing"
  | "error_backoff";

export type BootstrapPolicy = "announce" | "seed";

export type FailedItem = {
  readonly itemId: string;
  readonly reason: Exclude<DispatchFailureReason, "aborted">;
  readonly error: string;
};

export type CycleResult = {
  readonly outcome: "completed" | "failed" | "aborted";
  readonly failedPhase: "fetching" | "committing" | null;
  readonly newCount: number;
  readonly announced: ReadonlyArray<string>;
  readonly skipped: ReadonlyArray<string>;
  readonly failed: ReadonlyArray<FailedItem>;
  readonly error: string | null;
};

export type CycleDeps = {
  readonly store: StateStore;
  readonly fetcher: SnapshotFetcher;
  readonly dispatcher: Dispatcher;
  readonly format: (item: Item) => NotificationPayload;
  readonly policy: DiffPolicy;
  readonly bootstrap: BootstrapPolicy;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
  readonly onTransition?: (from: CycleState, to: CycleState) => void;
};

function toEntry(item: Item, disposition: Disposition): CommitEntry {
  return {
    itemId: item.id,
    kind: item.kind,
    title: item.title,
    fingerprint: fingerprintItem(item),
    disposition,
  };
}

function uniqueById(items: ReadonlyArray<Item>): Array<Item> {
  const byId = new Map<string, Item>();
  for (const item of items) {
    if (!byId.has(item.id)) byId.set(item.id, item);
  }
  return [...byId.values()];
}

function abortedBeforeDiff(): CycleResult {
  return {
    outcome: "aborted",
    failedPhase: null,
    newCount: 0,
    announced: [],
    skipped: [],
    failed: [],
    error: null,
  };
}

/**
 * Runs one fetch → diff → dispatch → commit pass.
 *
 * Only items whose dispatch succeeded (or that the bootstrap policy skipped)
 * are committed. A failed fetch, SeenSet load or commit ends the pass in
 * `error_backoff` with the SeenSet untouched; the caller owns the backoff
 * wait. The stop signal is honoured between items, and whatever was already
 * dispatched is still committed. A fetch cut short by the stop signal is an
 * abort, not a failure.
 *
 * Under the `seed` bootstrap the first pass since the store was created (or
 * reset) records the current library as skipped, and marks the store seeded
 * even when the library is empty.
 */
export async function runCycle(deps: CycleDeps): Promise<CycleResult> {
  const { logger, signal } = deps;
  let state: CycleState = "idle";

  const moveTo = (next: CycleState): void => {
    deps.onTransition?.(state, next);
    state = next;
  };

  moveTo("fetching");

  let seen: SeenSet;
  let firstRun: boolean;
  let snapshot: Snapshot;
  try {
    seen = deps.store.load();
    firstRun = deps.bootstrap === "seed" && !deps.store.isSeeded();
    snapshot = await deps.fetcher.fetch(signal);
  } catch (err) {
    if (signal?.aborted) {
      logger.info("cycle stopped during fetch");
      moveTo("idle");
      return abortedBeforeDiff();
    }

    const message = errorMessage(err);
    logger.error(
      { code: err instanceof PipelineError ? err.code : "unexpected", error: message },
      "cycle fetch failed, seen set untouched",
    );
    moveTo("error_backoff");
    return {
      outcome: "failed",
      failedPhase: "fetching",
      newCount: 0,
      announced: [],
      skipped: [],
      failed: [],
      error: message,
    };
  }

  if (signal?.aborted) {
    moveTo("idle");
    return abortedBeforeDiff();
  }

  moveTo("diffing");

  const entries: Array<CommitEntry> = [];
  const failed: Array<FailedItem> = [];
  let newCount = 0;
  let aborted = false;

  if (firstRun && seen.size === 0) {
    const existing = uniqueById(snapshot.items);
    logger.info(
      { itemCount: existing.length },
      "empty seen set, recording current library without announcing",
    );
    for (const item of existing) entries.push(toEntry(item, "skipped"));
  } else {
    const fresh = diffSnapshot(snapshot, seen, deps.policy);
    newCount = fresh.length;
    logger.info(
      { snapshotSize: snapshot.items.length, newCount },
      "snapshot diffed",
    );

    if (fresh.length > 0) {
      moveTo("dispatching");

      for (const item of fresh) {
        if (signal?.aborted) {
          aborted = true;
          break;
        }

        const result = await deps.dispatcher.send(deps.format(item), signal);
        if (result.success) {
          entries.push(toEntry(item, "announced"));
          logger.info(
            { itemId: item.id, title: item.title, attempts: result.attempts },
            "item announced",
          );
        } else if (result.reason === "aborted") {
          aborted = true;
          break;
        } else {
          failed.push({ itemId: item.id, reason: result.reason, error: result.error });
          logger.warn(
            { itemId: item.id, reason: result.reason, error: result.error },
            "item not announced, will retry next cycle",
          );
        }
      }
    }
  }

  moveTo("committing");

  const announced = entries
    .filter((e) => e.disposition === "announced")
    .map((e) => e.itemId);
  const skipped = entries
    .filter((e) => e.disposition === "skipped")
    .map((e) => e.itemId);

  try {
    deps.store.commit(entries, { markSeeded: firstRun });
  } catch (err) {
    const message = errorMessage(err);
    logger.error(
      { error: message, uncommitted: entries.length },
      "commit failed, items will be dispatched again next cycle",
    );
    moveTo("error_backoff");
    return {
      outcome: "failed",
      failedPhase: "committing",
      newCount,
      announced,
      skipped,
      failed,
      error: message,
    };
  }

  moveTo("idle");

  return {
    outcome: aborted ? "aborted" : "completed",
    failedPhase: null,
    newCount,
    announced,
    skipped,
    failed,
    error: null,
  };
}
