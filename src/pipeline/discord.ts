// pattern: Imperative Shell
import { createHash } from "node:crypto";
import { z } from "zod";
import type { Logger } from "pino";
import { errorMessage } from "./errors";
import type { NotificationPayload } from "./types";

export type DiscordEmbed = {
  readonly title: string;
  readonly description: string;
  readonly url?: string;
  readonly color?: number;
  readonly timestamp?: string;
  readonly footer?: { readonly text: string };
  readonly thumbnail?: { readonly url: string };
};

export type DiscordWebhookPayload = {
  readonly username?: string;
  readonly avatar_url?: string;
  readonly embeds: ReadonlyArray<DiscordEmbed>;
};

export type SinkResult =
  | { readonly kind: "delivered" }
  | { readonly kind: "throttled"; readonly retryAfterMs: number }
  | {
      readonly kind: "failed";
      readonly status: "client" | "server" | "network";
      readonly error: string;
    };

/**
 * One delivery attempt. Never throws; every outcome is a SinkResult.
 */
export type NotificationSink = {
  readonly deliver: (
    payload: NotificationPayload,
    signal?: AbortSignal,
  ) => Promise<SinkResult>;
};

export type DiscordSinkOptions = {
  readonly webhookUrl: string;
  readonly username?: string;
  readonly avatarUrl?: string;
  readonly requestTimeoutMs: number;
};

const DEFAULT_RETRY_AFTER_MS = 1000;

const rateLimitBodySchema = z.object({
  retry_after: z.number().nonnegative(),
});

export function toWebhookPayload(
  payload: NotificationPayload,
  identity: { readonly username?: string; readonly avatarUrl?: string } = {},
): DiscordWebhookPayload {
  const embed: DiscordEmbed = {
    title: payload.title,
    description: payload.description,
    timestamp: payload.timestamp,
    ...(payload.url !== null ? { url: payload.url } : {}),
    ...(payload.color !== null ? { color: payload.color } : {}),
    ...(payload.footer !== null ? { footer: { text: payload.footer } } : {}),
    ...(payload.imageUrl !== null ? { thumbnail: { url: payload.imageUrl } } : {}),
  };

  return {
    ...(identity.username !== undefined ? { username: identity.username } : {}),
    ...(identity.avatarUrl !== undefined ? { avatar_url: identity.avatarUrl } : {}),
    embeds: [embed],
  };
}

/**
 * Short stable tag for a webhook URL so logs never carry its token.
 */
export function endpointFingerprint(url: string): string {
  return createHash("sha256").update(url).digest("hex").slice(0, 8);
}

/**
 * Reads the throttle delay from a 429: the JSON `retry_after` (seconds)
 * first, then the Retry-After header, then a one second default.
 */
export async function readRetryAfterMs(response: Response): Promise<number> {
  const body: unknown = await response.json().catch(() => null);
  const parsed = rateLimitBodySchema.safeParse(body);
  if (parsed.success) {
    return Math.ceil(parsed.data.retry_after * 1000);
  }

  const header = response.headers.get("retry-after");
  const seconds = header === null ? Number.NaN : Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.ceil(seconds * 1000);
  }
  return DEFAULT_RETRY_AFTER_MS;
}

export function createDiscordSink(
  options: DiscordSinkOptions,
  logger: Logger,
): NotificationSink {
  const endpoint = endpointFingerprint(options.webhookUrl);
  const identity = { username: options.username, avatarUrl: options.avatarUrl };

  async function releaseBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (err) {
      logger.debug({ endpoint, error: errorMessage(err) }, "discord response body not released");
    }
  }

  return {
    deliver: async (payload, signal) => {
      const timeout = AbortSignal.timeout(options.requestTimeoutMs);
      const startedAt = Date.now();

      let response: Response;
      try {
        response = await fetch(options.webhookUrl, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(toWebhookPayload(payload, identity)),
          signal: signal ? AbortSignal.any([timeout, signal]) : timeout,
        });
      } catch (err) {
        const message = errorMessage(err);
        logger.warn(
          { endpoint, itemId: payload.itemId, error: message },
          "discord webhook request errored",
        );
        return { kind: "failed", status: "network", error: message };
      }

      const durationMs = Date.now() - startedAt;

      if (response.ok) {
        await releaseBody(response);
        logger.debug(
          { endpoint, itemId: payload.itemId, status: response.status, durationMs },
          "discord webhook delivered",
        );
        return { kind: "delivered" };
      }

      if (response.status === 429) {
        const retryAfterMs = await readRetryAfterMs(response);
        logger.warn(
          { endpoint, itemId: payload.itemId, retryAfterMs },
          "discord webhook throttled",
        );
        return { kind: "throttled", retryAfterMs };
      }

      await releaseBody(response);
      const error = `HTTP ${response.status}: ${response.statusText}`;
      logger.warn(
        { endpoint, itemId: payload.itemId, status: response.status, durationMs },
        "discord webhook request failed",
      );
      return {
        kind: "failed",
        status: response.status >= 500 ? "server" : "client",
        error,
      };
    },
  };
}
