import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import type { ServiceConfig } from "./config";
import { createNiluRoutes } from "./routes/nilu-routes";
import type { NiluClient } from "./services/nilu-client";

const ROUTES = [
  "/api/areas",
  "/api/stations",
  "/api/components",
  "/api/aqis",
  "/api/timeseries",
  "/api/observations/:from/:to/:station?",
];

export function createApp(
  client: NiluClient,
  config: Pick<ServiceConfig, "corsOrigins"> = { corsOrigins: "*" }
) {
  const app = new Hono();

  app.use(
    cors({
      origin: config.corsOrigins,
      allowMethods: ["GET", "OPTIONS"],
      allowHeaders: ["Content-Type"],
      exposeHeaders: ["Content-Length"],
      maxAge: 86400,
    })
  );

  app.use(logger());

  app.route("/api", createNiluRoutes(client));

  app.get("/", (c) => {
    return c.json({ message: "NILU air quality API proxy", routes: ROUTES });
  });

  app.get("/health", (c) => c.json({ status: "ok" }));

  return app;
}
