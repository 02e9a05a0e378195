export type ItemKind =
  | "movie"
  | "show"
  | "season"
  | "episode"
  | "artist"
  | "album"
  | "track";

export type ItemParent = {
  readonly id: string | null;
  readonly title: string;
};

export type Item = {
  readonly id: string;
  readonly kind: ItemKind;
  readonly title: string;
  readonly library: string;
  readonly addedAt: Date;
  readonly parent: ItemParent | null;
  readonly artwork: string | null;
  readonly year: number | null;
  readonly seasonNumber: number | null;
  readonly episodeNumber: number | null;
};

export type Snapshot = {
  readonly items: ReadonlyArray<Item>;
  readonly fetchedAt: Date;
};

export type SeenEntry = {
  readonly fingerprint: string;
};

/**
 * Identifiers already announced (or durably skipped), keyed by item id.
 */
export type SeenSet = ReadonlyMap<string, SeenEntry>;

export type Disposition = "announced" | "skipped";

export type CommitEntry = {
  readonly itemId: string;
  readonly kind: ItemKind;
  readonly title: string;
  readonly fingerprint: string;
  readonly disposition: Disposition;
};

export type NotificationPayload = {
  readonly itemId: string;
  readonly title: string;
  readonly description: string;
  readonly imageUrl: string | null;
  readonly url: string | null;
  readonly color: number | null;
  readonly footer: string | null;
  readonly timestamp: string;
};

export type DiffPolicy = "identity" | "metadata";
