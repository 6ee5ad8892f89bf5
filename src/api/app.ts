import express from "express";
import { logger } from "../lib/logger.js";
import type { AppConfig } from "../lib/config.js";
import type { OwnershipResolver } from "../lib/ownershipResolver.js";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler.js";
import { homeRouter } from "./routes/home.js";
import { ownershipRouter } from "./routes/ownership.js";
import { router as shareholdingRouter } from "./routes/shareholding.js";

export type AppDeps = {
  resolver: Pick<OwnershipResolver, "resolve">;
  ownership: AppConfig["ownership"];
};

export function createApp({ resolver, ownership }: AppDeps) {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.urlencoded({ extended: true }));
  app.use(express.json({ limit: "100kb" }));
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, path: req.originalUrl }, "Request");
    next();
  });

  app.get("/health", (_req, res) => res.json({ ok: true }));
  app.use("/api", ownershipRouter({ resolver, ownership }));
  app.use("/api", shareholdingRouter);
  app.use("/", homeRouter(ownership));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
