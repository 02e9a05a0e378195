// pattern: Imperative Shell
import { z } from "zod";
import { desc } from "drizzle-orm";
import { router, publicProcedure } from "../trpc";
import { cycles } from "../../db/schema";

export const cyclesRouter = router({
  list: publicProcedure
    .input(
      z
        .object({
          limit: z.number().int().positive().max(100).default(20),
        })
        .default({}),
    )
    .query(({ ctx, input }) => {
      return ctx.db
        .select()
        .from(cycles)
        .orderBy(desc(cycles.id))
        .limit(input.limit)
        .all();
    }),
});
