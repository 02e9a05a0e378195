import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema } from "./schema";
import type { AppConfig, LibraryConfig } from "./schema";

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

/**
 * Replaces `${NAME}` and `${NAME:-fallback}` with values from `env`.
 * Unset variables without a fallback become empty strings.
 */
export function substituteEnv(
  raw: string,
  env: Readonly<Record<string, string | undefined>>,
): string {
  return raw.replace(
    ENV_REFERENCE,
    (_match, name: string, fallback: string | undefined) => {
      const value = env[name];
      if (value !== undefined && value !== "") return value;
      return fallback ?? "";
    },
  );
}

export function loadConfig(
  configPath: string,
  env: Readonly<Record<string, string | undefined>> = process.env,
): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(substituteEnv(raw, env));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  const result = appConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid configuration in ${configPath}:\n${issues}`);
  }

  return result.data;
}

/**
 * The webhook every announcement goes to: the testing webhook while testing
 * mode is on, the live channel otherwise.
 */
export function deliveryWebhookUrl(discord: AppConfig["discord"]): string {
  const { testing } = discord;
  if (testing.enabled && testing.webhookUrl !== undefined) {
    return testing.webhookUrl;
  }
  return discord.webhookUrl;
}

export type { AppConfig, LibraryConfig };
