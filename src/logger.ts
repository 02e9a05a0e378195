import pino from "pino";

/**
 * Log paths that may carry Plex or Discord credentials. Webhook URLs embed
 * their token in the path, so they are censored whole.
 */
const REDACTED_PATHS = [
  "token",
  "*.token",
  "webhookUrl",
  "*.webhookUrl",
  "*.*.webhookUrl",
  'headers["X-Plex-Token"]',
  'headers["x-plex-token"]',
  '*.headers["X-Plex-Token"]',
];

/**
 * Creates the service logger: JSON lines with string level labels and ISO
 * timestamps, every line tagged with the service name. Level comes from
 * `LOG_LEVEL` unless overridden; output goes to stdout unless a destination
 * is given.
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    base: { service: "media-herald", pid: process.pid },
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination ? pino(options, destination) : pino(options);
}
