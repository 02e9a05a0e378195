import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "pino";
import type { NotificationSink } from "./discord";
import type { NotificationPayload } from "./types";

export type DispatchFailureReason = "transient" | "rejected" | "aborted";

export type DispatchResult =
  | { readonly success: true; readonly attempts: number }
  | {
      readonly success: false;
      readonly reason: DispatchFailureReason;
      readonly error: string;
      readonly attempts: number;
    };

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type DispatcherOptions = {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly sleep?: Sleep;
};

export type Dispatcher = {
  readonly send: (
    payload: NotificationPayload,
    signal?: AbortSignal,
  ) => Promise<DispatchResult>;
};

export const abortableSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Delay before transient retry number `retry` (0-based): doubles from
 * `baseDelayMs` and never exceeds `maxDelayMs`.
 */
export function backoffDelay(
  retry: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  return Math.min(baseDelayMs * 2 ** retry, maxDelayMs);
}

/**
 * Wraps a sink with the delivery policy:
 * - throttled: wait the indicated time and resend the same payload, without
 *   spending the retry budget
 * - server or network failure: exponential backoff, at most `maxRetries`
 *   retries, then `transient`
 * - client failure: `rejected`, no retry
 *
 * An aborted signal ends the wait early and reports `aborted`.
 */
export function createDispatcher(
  sink: NotificationSink,
  options: DispatcherOptions,
  logger: Logger,
): Dispatcher {
  const sleep = options.sleep ?? abortableSleep;

  async function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
    try {
      await sleep(ms, signal);
    } catch (err) {
      if (signal?.aborted) return false;
      throw err;
    }
    return !signal?.aborted;
  }

  return {
    send: async (payload, signal) => {
      let attempts = 0;
      let retries = 0;
      let lastError = "aborted before delivery";

      while (!signal?.aborted) {
        attempts++;
        const result = await sink.deliver(payload, signal);

        if (result.kind === "delivered") {
          return { success: true, attempts };
        }

        if (result.kind === "throttled") {
          logger.info(
            { itemId: payload.itemId, retryAfterMs: result.retryAfterMs },
            "delivery throttled, waiting before resending",
          );
          lastError = `throttled for ${result.retryAfterMs}ms`;
          if (!(await pause(result.retryAfterMs, signal))) break;
          continue;
        }

        lastError = result.error;

        if (result.status === "client") {
          logger.error(
            { itemId: payload.itemId, error: result.error, attempts },
            "delivery rejected",
          );
          return { success: false, reason: "rejected", error: result.error, attempts };
        }

        if (signal?.aborted) break;

        if (retries >= options.maxRetries) {
          logger.error(
            { itemId: payload.itemId, error: result.error, attempts },
            "delivery failed after retries",
          );
          return { success: false, reason: "transient", error: result.error, attempts };
        }

        const waitMs = backoffDelay(retries, options.baseDelayMs, options.maxDelayMs);
        retries++;
        logger.warn(
          { itemId: payload.itemId, error: result.error, retry: retries, waitMs },
          "delivery failed, retrying",
        );
        if (!(await pause(waitMs, signal))) break;
      }

      return { success: false, reason: "aborted", error: lastError, attempts };
    },
  };
}
