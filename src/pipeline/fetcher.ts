import { z } from "zod";
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { LibraryConfig } from "../config";
import { SourceMalformed, SourceUnavailable, errorMessage } from "./errors";
import type { Item, ItemKind, ItemParent, Snapshot } from "./types";

export type SnapshotFetcher = {
  readonly fetch: (signal?: AbortSignal) => Promise<Snapshot>;
};

export type PlexFetcherOptions = {
  readonly url: string;
  readonly token: string;
  readonly libraries: ReadonlyArray<LibraryConfig>;
  readonly lookback?: string;
  readonly requestTimeoutMs: number;
  readonly maxConcurrency: number;
  readonly now?: () => Date;
};

const PLEX_TYPE: Record<ItemKind, number> = {
  movie: 1,
  show: 2,
  season: 3,
  episode: 4,
  artist: 8,
  album: 9,
  track: 10,
};

const LOOKBACK_UNIT_MS = {
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
} as const;

const YEAR_SUFFIX = /\([12][0-9]{3}\)$/;

const sectionsResponseSchema = z.object({
  MediaContainer: z.object({
    Directory: z
      .array(
        z.object({
          key: z.union([z.string(), z.number()]).transform(String),
          title: z.string(),
        }),
      )
      .default([]),
  }),
});

const ratingKeySchema = z
  .union([z.string(), z.number()])
  .transform(String)
  .pipe(z.string().min(1));

const metadataSchema = z.object({
  ratingKey: ratingKeySchema,
  title: z.string().min(1),
  addedAt: z.number().int().nonnegative(),
  year: z.number().int().optional(),
  thumb: z.string().optional(),
  parentRatingKey: ratingKeySchema.optional(),
  parentTitle: z.string().optional(),
  parentIndex: z.number().int().optional(),
  grandparentRatingKey: ratingKeySchema.optional(),
  grandparentTitle: z.string().optional(),
  index: z.number().int().optional(),
});

const itemsResponseSchema = z.object({
  MediaContainer: z.object({
    Metadata: z.array(metadataSchema).default([]),
  }),
});

export type PlexMetadata = z.infer<typeof metadataSchema>;

/**
 * Converts a lookback window such as "24h" to milliseconds.
 */
export function parseLookback(lookback: string): number {
  const match = /^([1-9][0-9]*)([mhdw])$/.exec(lookback);
  const amount = match?.[1];
  const unit = match?.[2];
  if (amount === undefined || unit === undefined || !isLookbackUnit(unit)) {
    throw new Error(`invalid lookback period: ${lookback}`);
  }
  return Number(amount) * LOOKBACK_UNIT_MS[unit];
}

function isLookbackUnit(unit: string): unit is keyof typeof LOOKBACK_UNIT_MS {
  return unit in LOOKBACK_UNIT_MS;
}

/**
 * Appends the release year unless the title already ends with one,
 * so "The Flash (2014)" never becomes "The Flash (2014) (2014)".
 */
export function withYear(title: string, year: number | null): string {
  if (year === null || YEAR_SUFFIX.test(title)) return title;
  return `${title} (${year})`;
}

function parentOf(kind: ItemKind, meta: PlexMetadata): ItemParent | null {
  switch (kind) {
    case "episode":
    case "track":
      return meta.grandparentTitle
        ? { id: meta.grandparentRatingKey ?? null, title: meta.grandparentTitle }
        : null;
    case "season":
    case "album":
      return meta.parentTitle
        ? { id: meta.parentRatingKey ?? null, title: meta.parentTitle }
        : null;
    default:
      return null;
  }
}

export function toItem(kind: ItemKind, library: string, meta: PlexMetadata): Item {
  const year = meta.year ?? null;
  const titled = kind === "movie" || kind === "show";

  return {
    id: meta.ratingKey,
    kind,
    title: titled ? withYear(meta.title, year) : meta.title,
    library,
    addedAt: new Date(meta.addedAt * 1000),
    parent: parentOf(kind, meta),
    artwork: meta.thumb ?? null,
    year,
    seasonNumber: kind === "episode" ? meta.parentIndex ?? null : null,
    episodeNumber: kind === "episode" ? meta.index ?? null : null,
  };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.join(".")}: ${i.message}`)
    .join("; ");
}

/**
 * Creates a fetcher that lists the configured Plex library sections.
 * Throws SourceUnavailable on transport or HTTP failure and SourceMalformed
 * when a response does not validate; an item without a ratingKey fails the
 * whole snapshot.
 */
export function createPlexFetcher(
  options: PlexFetcherOptions,
  logger: Logger,
): SnapshotFetcher {
  const baseUrl = options.url.replace(/\/+$/, "");
  const now = options.now ?? (() => new Date());

  async function getJson(path: string, signal?: AbortSignal): Promise<unknown> {
    const timeout = AbortSignal.timeout(options.requestTimeoutMs);
    let response: Response;
    try {
      response = await fetch(`${baseUrl}${path}`, {
        headers: {
          Accept: "application/json",
          "X-Plex-Token": options.token,
        },
        signal: signal ? AbortSignal.any([timeout, signal]) : timeout,
      });
    } catch (err) {
      throw new SourceUnavailable(
        `plex request ${path} failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    if (!response.ok) {
      throw new SourceUnavailable(
        `plex request ${path} failed: HTTP ${response.status}: ${response.statusText}`,
      );
    }

    try {
      return await response.json();
    } catch (err) {
      throw new SourceMalformed(
        `plex response for ${path} is not valid JSON: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  async function resolveSections(
    signal?: AbortSignal,
  ): Promise<Map<string, string>> {
    const body = await getJson("/library/sections", signal);
    const parsed = sectionsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceMalformed(
        `plex library sections response is malformed: ${describeIssues(parsed.error)}`,
      );
    }

    const sections = new Map<string, string>();
    for (const directory of parsed.data.MediaContainer.Directory) {
      sections.set(directory.title, directory.key);
    }
    return sections;
  }

  async function fetchLibrary(
    library: LibraryConfig,
    sectionKey: string,
    signal?: AbortSignal,
  ): Promise<ReadonlyArray<Item>> {
    let query = `type=${PLEX_TYPE[library.kind]}&sort=addedAt:desc`;
    if (options.lookback) {
      const since = now().getTime() - parseLookback(options.lookback);
      query += `&addedAt>>=${Math.floor(since / 1000)}`;
    }

    const body = await getJson(
      `/library/sections/${encodeURIComponent(sectionKey)}/all?${query}`,
      signal,
    );
    const parsed = itemsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceMalformed(
        `plex library "${library.name}" returned malformed items: ${describeIssues(parsed.error)}`,
      );
    }

    const items = parsed.data.MediaContainer.Metadata.map((meta) =>
      toItem(library.kind, library.name, meta),
    );
    logger.debug(
      { library: library.name, itemCount: items.length },
      "library section fetched",
    );
    return items;
  }

  return {
    fetch: async (signal) => {
      const targets = options.libraries.filter((library) => library.enabled);
      const fetchedAt = now();

      if (targets.length === 0) {
        logger.warn("no enabled libraries configured, snapshot is empty");
        return { items: [], fetchedAt };
      }

      const sections = await resolveSections(signal);
      const resolved = targets.map((library) => {
        const sectionKey = sections.get(library.name);
        if (sectionKey === undefined) {
          throw new SourceUnavailable(
            `library section "${library.name}" not found on plex server`,
          );
        }
        return { library, sectionKey };
      });

      const limit = pLimit(options.maxConcurrency);
      const batches = await Promise.all(
        resolved.map(({ library, sectionKey }) =>
          limit(() => fetchLibrary(library, sectionKey, signal)),
        ),
      );

      const items = batches.flat();
      logger.info(
        { libraryCount: targets.length, itemCount: items.length },
        "library snapshot fetched",
      );
      return { items, fetchedAt };
    },
  };
}
