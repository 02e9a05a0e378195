// pattern: Functional Core
import type { Item, ItemKind, NotificationPayload } from "./types";

export const TITLE_MAX_LENGTH = 256;
export const DESCRIPTION_MAX_LENGTH = 4096;

export type FormatOptions = {
  readonly colours: Readonly<Partial<Record<ItemKind, number>>>;
  readonly emotes: Readonly<Partial<Record<ItemKind, string>>>;
  readonly overflowFooter: string;
  readonly thumbnail?: string;
  readonly artworkBaseUrl?: string;
  readonly serverId?: string;
};

const KIND_LABEL: Record<ItemKind, string> = {
  movie: "Movie",
  show: "Show",
  season: "Season",
  episode: "Episode",
  artist: "Artist",
  album: "Album",
  track: "Track",
};

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

function headline(item: Item): string {
  const parts: Array<string> = [];
  if (item.parent) parts.push(item.parent.title);
  if (
    item.kind === "episode" &&
    item.seasonNumber !== null &&
    item.episodeNumber !== null
  ) {
    parts.push(`S${pad(item.seasonNumber)}E${pad(item.episodeNumber)}`);
  }
  parts.push(item.title);
  return parts.join(" · ");
}

function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.slice(0, max - 1)}…`;
}

/**
 * Cuts `text` to at most `max` characters, ending on a line break where one
 * exists, and appends the overflow footer in bold.
 */
export function trimOnNewlines(text: string, max: number, footer: string): string {
  if (text.length <= max) return text;

  const suffix = `\n\n**${footer}**`;
  const budget = Math.max(0, max - suffix.length);
  const end = text.lastIndexOf("\n", budget);
  const cut = end > 0 ? end : budget;
  return `${text.slice(0, cut)}${suffix}`;
}

function resolveImage(item: Item, options: FormatOptions): string | null {
  if (item.artwork && options.artworkBaseUrl) {
    return `${options.artworkBaseUrl.replace(/\/+$/, "")}${item.artwork}`;
  }
  return options.thumbnail ?? null;
}

function plexWebLink(serverId: string, itemId: string): string {
  const key = encodeURIComponent(`/library/metadata/${itemId}`);
  return `https://app.plex.tv/desktop/#!/server/${serverId}/details?key=${key}`;
}

/**
 * Builds the announcement for one item. Missing artwork, parent or episode
 * numbers drop the matching part of the message.
 */
export function formatNotification(
  item: Item,
  options: FormatOptions,
): NotificationPayload {
  const emote = options.emotes[item.kind];
  const title = emote ? `${emote} ${headline(item)}` : headline(item);

  const lines = [`New ${KIND_LABEL[item.kind].toLowerCase()} added to **${item.library}**`];
  if (item.year !== null && item.kind !== "movie" && item.kind !== "show") {
    lines.push(`Year: ${item.year}`);
  }

  return {
    itemId: item.id,
    title: truncate(title, TITLE_MAX_LENGTH),
    description: trimOnNewlines(
      lines.join("\n"),
      DESCRIPTION_MAX_LENGTH,
      options.overflowFooter,
    ),
    imageUrl: resolveImage(item, options),
    url: options.serverId ? plexWebLink(options.serverId, item.id) : null,
    color: options.colours[item.kind] ?? null,
    footer: KIND_LABEL[item.kind],
    timestamp: item.addedAt.toISOString(),
  };
}
