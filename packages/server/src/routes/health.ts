import { Hono } from "hono";
import type { EndpointConfig } from "@portico/core/schemas";
import { computeUrl } from "@portico/core/url";

export interface HealthDeps {
  endpointId: string;
  version: string;
  startedAt: Date;
  /** Read on every request so config updates show up. */
  getConfig: () => EndpointConfig;
}

export function healthRoute(deps: HealthDeps): Hono {
  const app = new Hono();

  app.get("/health", (c) => {
    const uptimeMs = Date.now() - deps.startedAt.getTime();

    return c.json({
      status: "healthy",
      endpoint: deps.endpointId,
      url: computeUrl(deps.getConfig()),
      version: deps.version,
      uptime: Math.floor(uptimeMs / 1000),
    });
  });

  return app;
}
