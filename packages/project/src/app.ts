import {
  App,
  createLogger,
  createRouteTable,
  type Logger,
  requestLogger,
} from "@tracker/core";
import type { AdminSite } from "@tracker/admin";
import type { TrackerConfig } from "./config.ts";
import { urlpatterns } from "./urls.ts";
import { createAdminSite } from "./users/admin.ts";

export interface TrackerApp {
  app: App;
  admin: AdminSite;
  logger: Logger;
}

export function createProjectLogger(config: TrackerConfig): Logger {
  return createLogger({
    name: "tracker",
    level: config.logLevel,
    json: config.logFormat === "json",
  });
}

/**
 * Wire routes, middleware and the admin site from a configuration.
 */
export function createTrackerApp(
  config: TrackerConfig,
  logger: Logger = createProjectLogger(config),
): TrackerApp {
  const development = config.environment === "development";
  const routes = createRouteTable(urlpatterns, {
    logger: logger.child({ name: "router" }),
  });

  const app = new App(routes, {
    logger,
    development,
    appendSlash: config.appendSlash,
  }).use(requestLogger(logger.child({ name: "http" })));

  const admin = createAdminSite();
  logger.debug("Admin models registered", {
    models: admin.entries().map((entry) => entry.model.name),
  });

  return { app, admin, logger };
}
