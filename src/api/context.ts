// pattern: Functional Core
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import type { StateStore } from "../pipeline/state-store";
import type { Logger } from "pino";

/**
 * tRPC context passed to all procedures: the database, the SeenSet store
 * the pipeline commits to, configuration, and the structured logger.
 */
export type AppContext = {
  readonly db: AppDatabase;
  readonly store: StateStore;
  readonly config: AppConfig;
  readonly logger: Logger;
};
