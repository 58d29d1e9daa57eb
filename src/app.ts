import express, { Express, RequestHandler } from "express";
import { Logger } from "./logger";
import { createErrorHandler } from "./middleware/error-handler";
import { createMarketplaceRouter, MarketplaceRouteDeps } from "./routes/marketplace";
import { createSettingsRouter, SettingsRouteDeps } from "./routes/settings";
import { createUpdatesRouter, UpdatesRouteDeps } from "./routes/updates";

export type AppConfig = MarketplaceRouteDeps &
  SettingsRouteDeps &
  UpdatesRouteDeps & {
    logger: Logger;
    middlewares?: RequestHandler[];
  };

export function createApp(config: AppConfig): Express {
  const app = express();
  const { middlewares = [], logger } = config;

  app.use(express.json());

  middlewares.forEach((middleware) => {
    app.use(middleware);
  });

  app.use("/api/marketplace", createMarketplaceRouter(config));
  app.use("/api/settings", createSettingsRouter(config));
  app.use("/api/updates", createUpdatesRouter(config));

  app.use(createErrorHandler(logger));

  return app;
}
