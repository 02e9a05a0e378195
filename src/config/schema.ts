import cron from "node-cron";
import { z } from "zod";

const itemKindSchema = z.enum([
  "movie",
  "show",
  "season",
  "episode",
  "artist",
  "album",
  "track",
]);

const libraryConfigSchema = z.object({
  name: z.string().min(1),
  kind: itemKindSchema,
  enabled: z.boolean().default(true),
});

const lookbackSchema = z
  .string()
  .regex(/^[1-9][0-9]*[mhdw]$/, "expected a duration such as 30m, 24h, 7d or 2w");

export const appConfigSchema = z.object({
  plex: z.object({
    url: z.string().url(),
    token: z.string().min(1),
    serverId: z.string().min(1).optional(),
    libraries: z.array(libraryConfigSchema).min(1),
    lookback: lookbackSchema.optional(),
    requestTimeoutMs: z.number().int().positive().default(15000),
    maxConcurrency: z.number().int().positive().default(2),
  }),
  discord: z.object({
    webhookUrl: z.string().url(),
    username: z.string().min(1).optional(),
    avatarUrl: z.string().url().optional(),
    testing: z
      .object({
        enabled: z.boolean().default(false),
        webhookUrl: z.string().url().optional(),
      })
      .refine((t) => !t.enabled || t.webhookUrl !== undefined, {
        message: "testing.webhookUrl is required when testing is enabled",
      })
      .default({}),
    embed: z
      .object({
        thumbnail: z.string().url().optional(),
        artworkBaseUrl: z.string().url().optional(),
        colours: z.record(itemKindSchema, z.number().int().nonnegative()).default({}),
        emotes: z.record(itemKindSchema, z.string()).default({}),
        overflowFooter: z.string().default("...and more"),
      })
      .default({}),
  }),
  schedule: z.object({
    poll: z
      .string()
      .min(1)
      .refine((expression) => cron.validate(expression), "invalid cron expression"),
    runOnStart: z.boolean().default(true),
    errorBackoffSeconds: z.number().int().nonnegative().default(60),
    maxConsecutiveFailures: z.number().int().nonnegative().default(0),
  }),
  dispatch: z
    .object({
      maxRetries: z.number().int().nonnegative().default(4),
      baseDelayMs: z.number().int().positive().default(1000),
      maxDelayMs: z.number().int().positive().default(30000),
      requestTimeoutMs: z.number().int().positive().default(10000),
    })
    .default({}),
  announce: z
    .object({
      bootstrap: z.enum(["announce", "seed"]).default("announce"),
      policy: z.enum(["identity", "metadata"]).default("identity"),
    })
    .default({}),
  monitoring: z
    .object({
      heartbeatUrl: z.string().url().optional(),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type LibraryConfig = z.infer<typeof libraryConfigSchema>;
