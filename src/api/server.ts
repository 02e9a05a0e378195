// pattern: Imperative Shell
import express from "express";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { appRouter } from "./router";
import type { AppContext } from "./context";

/**
 * Creates the operator API: tRPC under `/api/trpc` and a `/health` probe
 * for container health checks. The caller decides the port.
 */
export function createApiServer(context: AppContext): express.Express {
  const app = express();

  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext: () => context,
    }),
  );

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", seenCount: context.store.count() });
  });

  return app;
}
