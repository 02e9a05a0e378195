// pattern: Imperative Shell
import { router } from "./trpc";
import { systemRouter } from "./routers/system";
import { cyclesRouter } from "./routers/cycles";
import { seenRouter } from "./routers/seen";

/**
 * Root tRPC router: service status, cycle history and the SeenSet.
 */
export const appRouter = router({
  system: systemRouter,
  cycles: cyclesRouter,
  seen: seenRouter,
});

export type AppRouter = typeof appRouter;
