// pattern: Imperative Shell
import type { Logger } from "pino";

export type Heartbeat = (durationMs: number) => Promise<void>;

/**
 * Pings an uptime monitor after each cycle with `GET {url}{seconds}`, the
 * cycle duration in whole seconds. Failures are logged and never thrown.
 */
export function createHeartbeat(
  url: string,
  logger: Logger,
  timeoutMs = 10000,
): Heartbeat {
  return async (durationMs) => {
    const seconds = Math.round(durationMs / 1000);
    try {
      const response = await fetch(`${url}${seconds}`, {
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!response.ok) {
        logger.warn(
          { status: response.status, statusText: response.statusText },
          "heartbeat ping rejected",
        );
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ error: message }, "heartbeat ping failed");
    }
  };
}
