import { describe, it, expect } from "vitest";
import { formatNotification, trimOnNewlines, TITLE_MAX_LENGTH } from "./formatter";
import type { FormatOptions } from "./formatter";
import { makeItem } from "../test-utils/db";

const options: FormatOptions = {
  colours: {},
  emotes: {},
  overflowFooter: "...and more",
};

describe("formatNotification", () => {
  it("should format a movie with every optional section omitted", () => {
    expect(formatNotification(makeItem(), options)).toEqual({
      itemId: "100",
      title: "Test Movie (2021)",
      description: "New movie added to **Movies**",
      imageUrl: null,
      url: null,
      color: null,
      footer: "Movie",
      timestamp: "2026-03-01T12:00:00.000Z",
    });
  });

  it("should prefix the show and episode number for episodes", () => {
    const item = makeItem({
      id: "501",
      kind: "episode",
      title: "Pilot",
      library: "TV Shows",
      parent: { id: "50", title: "Some Show" },
      year: 2026,
      seasonNumber: 1,
      episodeNumber: 2,
    });

    const payload = formatNotification(item, { ...options, emotes: { episode: "📺" } });

    expect(payload.title).toBe("📺 Some Show · S01E02 · Pilot");
    expect(payload.description).toBe("New episode added to **TV Shows**\nYear: 2026");
    expect(payload.footer).toBe("Episode");
  });

  it("should degrade to the bare title when parent and episode numbers are missing", () => {
    const item = makeItem({
      kind: "episode",
      title: "Pilot",
      parent: null,
      year: null,
      seasonNumber: null,
      episodeNumber: 3,
    });

    const payload = formatNotification(item, options);

    expect(payload.title).toBe("Pilot");
    expect(payload.description).toBe("New episode added to **Movies**");
  });

  it("should resolve artwork against the configured base url", () => {
    const item = makeItem({ artwork: "/library/metadata/100/thumb/1700000000" });

    const payload = formatNotification(item, {
      ...options,
      artworkBaseUrl: "https://img.test/",
      thumbnail: "https://img.test/logo.png",
    });

    expect(payload.imageUrl).toBe(
      "https://img.test/library/metadata/100/thumb/1700000000",
    );
  });

  it("should fall back to the static thumbnail without an artwork base url", () => {
    const item = makeItem({ artwork: "/library/metadata/100/thumb/1700000000" });

    const payload = formatNotification(item, {
      ...options,
      thumbnail: "https://img.test/logo.png",
    });

    expect(payload.imageUrl).toBe("https://img.test/logo.png");
  });

  it("should link to the item in Plex when a server id is configured", () => {
    const payload = formatNotification(makeItem(), { ...options, serverId: "abc123" });

    expect(payload.url).toBe(
      "https://app.plex.tv/desktop/#!/server/abc123/details?key=%2Flibrary%2Fmetadata%2F100",
    );
  });

  it("should apply the per-kind colour", () => {
    const payload = formatNotification(makeItem(), { ...options, colours: { movie: 15048717 } });
    expect(payload.color).toBe(15048717);
  });

  it("should cut overlong titles to the embed limit", () => {
    const payload = formatNotification(makeItem({ title: "x".repeat(300) }), options);

    expect(payload.title).toHaveLength(TITLE_MAX_LENGTH);
    expect(payload.title.endsWith("…")).toBe(true);
  });
});

describe("trimOnNewlines", () => {
  it("should leave text within the limit unchanged", () => {
    expect(trimOnNewlines("aaaa\nbbbb\ncccc", 20, "m")).toBe("aaaa\nbbbb\ncccc");
  });

  it("should cut at the last line break that fits and append the footer", () => {
    expect(trimOnNewlines("aaaa\nbbbb\ncccc", 13, "m")).toBe("aaaa\n\n**m**");
  });
});
