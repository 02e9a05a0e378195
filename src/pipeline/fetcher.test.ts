import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import pino from "pino";
import { createPlexFetcher, parseLookback, withYear } from "./fetcher";
import type { PlexFetcherOptions } from "./fetcher";
import { SourceMalformed, SourceUnavailable } from "./errors";

const logger = pino({ level: "silent" });

const sectionsBody = {
  MediaContainer: {
    Directory: [
      { key: "1", title: "Movies", type: "movie" },
      { key: "2", title: "TV Shows", type: "show" },
    ],
  },
};

function jsonResponse(body: unknown, status = 200, statusText = "OK") {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    json: vi.fn().mockResolvedValue(body),
  };
}

function baseOptions(overrides?: Partial<PlexFetcherOptions>): PlexFetcherOptions {
  return {
    url: "http://plex.test:32400/",
    token: "test-token",
    libraries: [{ name: "Movies", kind: "movie", enabled: true }],
    requestTimeoutMs: 5000,
    maxConcurrency: 2,
    now: () => new Date("2026-03-02T00:00:00Z"),
    ...overrides,
  };
}

describe("parseLookback", () => {
  it("should convert each unit to milliseconds", () => {
    expect(parseLookback("30m")).toBe(1_800_000);
    expect(parseLookback("24h")).toBe(86_400_000);
    expect(parseLookback("7d")).toBe(604_800_000);
    expect(parseLookback("2w")).toBe(1_209_600_000);
  });

  it("should reject malformed periods", () => {
    expect(() => parseLookback("0h")).toThrow("invalid lookback period: 0h");
    expect(() => parseLookback("24")).toThrow("invalid lookback period: 24");
  });
});

describe("withYear", () => {
  it("should append the year", () => {
    expect(withYear("The Flash", 2014)).toBe("The Flash (2014)");
  });

  it("should not duplicate a year already in the title", () => {
    expect(withYear("The Flash (2014)", 2014)).toBe("The Flash (2014)");
  });

  it("should leave the title alone without a year", () => {
    expect(withYear("Untitled", null)).toBe("Untitled");
  });
});

describe("createPlexFetcher", () => {
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should resolve the section and map movies into items", async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(sectionsBody))
      .mockResolvedValueOnce(
        jsonResponse({
          MediaContainer: {
            Metadata: [
              {
                ratingKey: "101",
                type: "movie",
                title: "Arrival",
                year: 2016,
                addedAt: 1772280000,
                thumb: "/library/metadata/101/thumb/1772280000",
              },
            ],
          },
        }),
      );

    const snapshot = await createPlexFetcher(baseOptions(), logger).fetch();

    expect(snapshot.fetchedAt).toEqual(new Date("2026-03-02T00:00:00Z"));
    expect(snapshot.items).toEqual([
      {
        id: "101",
        kind: "movie",
        title: "Arrival (2016)",
        library: "Movies",
        addedAt: new Date(1772280000 * 1000),
        parent: null,
        artwork: "/library/metadata/101/thumb/1772280000",
        year: 2016,
        seasonNumber: null,
        episodeNumber: null,
      },
    ]);
    expect(fetchMock).toHaveBeenNthCalledWith(
      1,
      "http://plex.test:32400/library/sections",
      expect.objectContaining({
        headers: { Accept: "application/json", "X-Plex-Token": "test-token" },
      }),
    );
    expect(fetchMock.mock.calls[1]?.[0]).toBe(
      "http://plex.test:32400/library/sections/1/all?type=1&sort=addedAt:desc",
    );
  });

  it("should map episodes with show, season and episode numbers", async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(sectionsBody))
      .mockResolvedValueOnce(
        jsonResponse({
          MediaContainer: {
            Metadata: [
              {
                ratingKey: 7001,
                type: "episode",
                title: "Pilot",
                addedAt: 1772280000,
                grandparentRatingKey: "70",
                grandparentTitle: "Some Show",
                parentIndex: 1,
                index: 4,
              },
            ],
          },
        }),
      );

    const snapshot = await createPlexFetcher(
      baseOptions({ libraries: [{ name: "TV Shows", kind: "episode", enabled: true }] }),
      logger,
    ).fetch();

    expect(snapshot.items).toEqual([
      {
        id: "7001",
        kind: "episode",
        title: "Pilot",
        library: "TV Shows",
        addedAt: new Date(1772280000 * 1000),
        parent: { id: "70", title: "Some Show" },
        artwork: null,
        year: null,
        seasonNumber: 1,
        episodeNumber: 4,
      },
    ]);
    expect(fetchMock.mock.calls[1]?.[0]).toBe(
      "http://plex.test:32400/library/sections/2/all?type=4&sort=addedAt:desc",
    );
  });

  it("should add the addedAt filter when a lookback window is configured", async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(sectionsBody))
      .mockResolvedValueOnce(jsonResponse({ MediaContainer: {} }));

    const snapshot = await createPlexFetcher(baseOptions({ lookback: "24h" }), logger).fetch();

    expect(snapshot.items).toEqual([]);
    // 2026-03-01T00:00:00Z
    expect(fetchMock.mock.calls[1]?.[0]).toBe(
      "http://plex.test:32400/library/sections/1/all?type=1&sort=addedAt:desc&addedAt>>=1772323200",
    );
  });

  it("should skip disabled libraries", async () => {
    const snapshot = await createPlexFetcher(
      baseOptions({ libraries: [{ name: "Movies", kind: "movie", enabled: false }] }),
      logger,
    ).fetch();

    expect(snapshot.items).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("should reject an item without a ratingKey as malformed", async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(sectionsBody))
      .mockResolvedValueOnce(
        jsonResponse({
          MediaContainer: {
            Metadata: [
              { ratingKey: "1", title: "Has Key", addedAt: 1772280000 },
              { title: "No Key", addedAt: 1772280000 },
            ],
          },
        }),
      );

    const fetcher = createPlexFetcher(baseOptions(), logger);

    await expect(fetcher.fetch()).rejects.toThrow(SourceMalformed);
  });

  it("should reject an empty ratingKey as malformed", async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(sectionsBody))
      .mockResolvedValueOnce(
        jsonResponse({
          MediaContainer: { Metadata: [{ ratingKey: "", title: "Blank", addedAt: 1 }] },
        }),
      );

    await expect(createPlexFetcher(baseOptions(), logger).fetch()).rejects.toThrow(
      SourceMalformed,
    );
  });

  it("should report a non-JSON body as malformed", async () => {
    fetchMock.mockResolvedValueOnce({
      ok: true,
      status: 200,
      statusText: "OK",
      json: vi.fn().mockRejectedValue(new SyntaxError("Unexpected token <")),
    });

    await expect(createPlexFetcher(baseOptions(), logger).fetch()).rejects.toThrow(
      "plex response for /library/sections is not valid JSON: Unexpected token <",
    );
  });

  it("should report HTTP errors as source unavailable", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({}, 401, "Unauthorized"));

    const result = createPlexFetcher(baseOptions(), logger).fetch();

    await expect(result).rejects.toThrow(SourceUnavailable);
    await expect(result).rejects.toThrow(
      "plex request /library/sections failed: HTTP 401: Unauthorized",
    );
  });

  it("should report network errors as source unavailable", async () => {
    fetchMock.mockRejectedValueOnce(new Error("getaddrinfo ENOTFOUND plex.test"));

    await expect(createPlexFetcher(baseOptions(), logger).fetch()).rejects.toThrow(
      SourceUnavailable,
    );
  });

  it("should report a configured library missing on the server as source unavailable", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(sectionsBody));

    const fetcher = createPlexFetcher(
      baseOptions({ libraries: [{ name: "Music", kind: "album", enabled: true }] }),
      logger,
    );

    await expect(fetcher.fetch()).rejects.toThrow(
      'library section "Music" not found on plex server',
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
