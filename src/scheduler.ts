import cron from "node-cron";
import type { Logger } from "pino";
import type { AppDatabase } from "./db";
import type { AppConfig } from "./config";
import { cycles } from "./db/schema";
import type { Heartbeat } from "./heartbeat";
import { runCycle } from "./pipeline/cycle";
import type { CycleResult, CycleState } from "./pipeline/cycle";
import { abortableSleep } from "./pipeline/dispatcher";
import type { Dispatcher, Sleep } from "./pipeline/dispatcher";
import type { SnapshotFetcher } from "./pipeline/fetcher";
import type { StateStore } from "./pipeline/state-store";
import type { Item, NotificationPayload } from "./pipeline/types";

export type AnnounceScheduler = {
  readonly stop: () => void;
  /** Resolves once the in-flight cycle, if any, has finished. */
  readonly drain: () => Promise<void>;
  /** Starts a cycle now; resolves to null when one is already running. */
  readonly trigger: () => Promise<CycleResult | null>;
};

export type CronTask = {
  readonly stop: () => void;
};

export type ScheduleFn = (expression: string, run: () => Promise<void>) => CronTask;

const cronSchedule: ScheduleFn = (expression, run) => cron.schedule(expression, run);

export type SchedulerDeps = {
  readonly db: AppDatabase;
  readonly config: AppConfig;
  readonly store: StateStore;
  readonly fetcher: SnapshotFetcher;
  readonly dispatcher: Dispatcher;
  readonly format: (item: Item) => NotificationPayload;
  readonly logger: Logger;
  readonly heartbeat?: Heartbeat;
  readonly onFatal?: (error: string) => void;
  readonly onTransition?: (from: CycleState, to: CycleState) => void;
  readonly sleep?: Sleep;
  readonly schedule?: ScheduleFn;
};

/**
 * Creates and starts the announce scheduler on the `schedule.poll` cron
 * expression. Cycles never overlap: a tick that lands while a cycle or its
 * error backoff is still running is skipped.
 *
 * @returns An AnnounceScheduler; stop() halts the cron task and signals the
 *          running cycle to stop between items.
 */
export function createAnnounceScheduler(deps: SchedulerDeps): AnnounceScheduler {
  const { config, logger } = deps;
  const sleep = deps.sleep ?? abortableSleep;
  const schedule = deps.schedule ?? cronSchedule;
  const controller = new AbortController();
  let running: Promise<CycleResult> | null = null;
  let consecutiveFailures = 0;

  function recordCycle(startedAt: Date, result: CycleResult): void {
    try {
      deps.db
        .insert(cycles)
        .values({
          startedAt,
          finishedAt: new Date(),
          outcome: result.outcome,
          failedPhase: result.failedPhase,
          newCount: result.newCount,
          sentCount: result.announced.length,
          failedCount: result.failed.length,
          error: result.error,
        })
        .run();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "failed to record cycle");
    }
  }

  async function backoff(): Promise<void> {
    const waitMs = config.schedule.errorBackoffSeconds * 1000;
    logger.info({ waitMs }, "cycle failed, backing off");
    try {
      await sleep(waitMs, controller.signal);
    } catch (err) {
      if (!controller.signal.aborted) throw err;
    }
    deps.onTransition?.("error_backoff", "idle");
  }

  async function execute(): Promise<CycleResult> {
    const startedAt = new Date();
    logger.info("announce cycle starting");

    let result: CycleResult;
    try {
      result = await runCycle({
        store: deps.store,
        fetcher: deps.fetcher,
        dispatcher: deps.dispatcher,
        format: deps.format,
        policy: config.announce.policy,
        bootstrap: config.announce.bootstrap,
        logger,
        signal: controller.signal,
        onTransition: deps.onTransition,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "unexpected error during announce cycle");
      result = {
        outcome: "failed",
        failedPhase: null,
        newCount: 0,
        announced: [],
        skipped: [],
        failed: [],
        error: message,
      };
    }

    recordCycle(startedAt, result);
    logger.info(
      {
        outcome: result.outcome,
        newCount: result.newCount,
        announced: result.announced.length,
        skipped: result.skipped.length,
        failed: result.failed.length,
      },
      "announce cycle complete",
    );

    if (deps.heartbeat) {
      await deps.heartbeat(Date.now() - startedAt.getTime());
    }

    if (result.outcome !== "failed") {
      consecutiveFailures = 0;
      return result;
    }

    consecutiveFailures++;
    const limit = config.schedule.maxConsecutiveFailures;
    if (limit > 0 && consecutiveFailures >= limit) {
      logger.fatal(
        { consecutiveFailures, error: result.error },
        "announce cycle failure threshold reached",
      );
      deps.onFatal?.(result.error ?? "announce cycle failed");
    }

    await backoff();
    return result;
  }

  function trigger(): Promise<CycleResult | null> {
    if (controller.signal.aborted) return Promise.resolve(null);
    if (running) {
      logger.warn("previous cycle still running, skipping tick");
      return Promise.resolve(null);
    }

    const current = execute().finally(() => {
      running = null;
    });
    running = current;
    return current;
  }

  const task = schedule(config.schedule.poll, async () => {
    try {
      await trigger();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "announce tick failed");
    }
  });

  return {
    stop: () => {
      task.stop();
      controller.abort();
    },
    drain: async () => {
      if (running) await running;
    },
    trigger,
  };
}
