// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Something shutdown must stop; `drain` waits for in-flight work.
 */
export type Stoppable = {
  readonly stop: () => void;
  readonly drain?: () => Promise<void>;
};

/**
 * Dependencies for the shutdown handler.
 */
export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  readonly closeServer?: () => void;
  readonly closeDb: () => void;
  readonly logger: Logger;
};

/**
 * Builds the shutdown routine: stop every scheduler, wait for in-flight
 * cycles to reach a stopping point, close the HTTP server and the database,
 * then exit 0. Every step runs even when an earlier one fails; repeated
 * signals are ignored.
 */
export function createShutdown(
  deps: ShutdownDeps,
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  return async (signal) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      try {
        scheduler.stop();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error stopping scheduler");
      }
    }

    const drains = await Promise.allSettled(
      deps.schedulers.map((scheduler) => scheduler.drain?.()),
    );
    for (const outcome of drains) {
      if (outcome.status === "rejected") {
        const reason: unknown = outcome.reason;
        const message = reason instanceof Error ? reason.message : String(reason);
        deps.logger.error({ error: message }, "error draining scheduler");
      }
    }

    if (deps.closeServer) {
      try {
        deps.closeServer();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error closing api server");
      }
    }

    try {
      deps.closeDb();
      deps.logger.info("database connection closed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "error closing database");
    }

    deps.logger.info("shutdown complete");
    process.exit(0);
  };
}

/**
 * Registers SIGTERM and SIGINT handlers that run the shutdown routine.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  const shutdown = createShutdown(deps);

  const handle = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => handle("SIGTERM"));
  process.on("SIGINT", () => handle("SIGINT"));
}
