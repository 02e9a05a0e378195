import { initTRPC } from "@trpc/server";
import type { AppContext } from "./context";

const t = initTRPC.context<AppContext>().create();

export const router = t.router;

const logFailures = t.middleware(async ({ ctx, path, type, next }) => {
  const result = await next();
  if (!result.ok) {
    ctx.logger.warn(
      { path, type, code: result.error.code, error: result.error.message },
      "api procedure failed",
    );
  }
  return result;
});

export const publicProcedure = t.procedure.use(logFailures);

/**
 * Calls procedures directly without HTTP transport; used by the router tests.
 */
export const createCallerFactory = t.createCallerFactory;
