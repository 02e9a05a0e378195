// pattern: Imperative Shell
import { desc } from "drizzle-orm";
import { router, publicProcedure } from "../trpc";
import { cycles } from "../../db/schema";

export const systemRouter = router({
  status: publicProcedure.query(({ ctx }) => {
    const lastCycle =
      ctx.db.select().from(cycles).orderBy(desc(cycles.id)).limit(1).get() ??
      null;

    return {
      pollSchedule: ctx.config.schedule.poll,
      libraries: ctx.config.plex.libraries
        .filter((library) => library.enabled)
        .map((library) => library.name),
      policy: ctx.config.announce.policy,
      testingMode: ctx.config.discord.testing.enabled,
      seenCount: ctx.store.count(),
      lastCycle,
    };
  }),
});
