// pattern: Imperative Shell
import { z } from "zod";
import { desc } from "drizzle-orm";
import { router, publicProcedure } from "../trpc";
import { seenItems } from "../../db/schema";

export const seenRouter = router({
  list: publicProcedure
    .input(
      z
        .object({
          limit: z.number().int().positive().max(100).default(50),
          offset: z.number().int().nonnegative().default(0),
        })
        .default({}),
    )
    .query(({ ctx, input }) => {
      return ctx.db
        .select()
        .from(seenItems)
        .orderBy(desc(seenItems.committedAt), seenItems.itemId)
        .limit(input.limit)
        .offset(input.offset)
        .all();
    }),

  /**
   * Operator reset: forgets every announced id, so the next cycle treats
   * the whole snapshot as new (or re-seeds it under the seed bootstrap).
   */
  reset: publicProcedure.mutation(({ ctx }) => {
    const removed = ctx.store.reset();
    ctx.logger.warn({ removed }, "seen set reset by operator");
    return { removed };
  }),
});
