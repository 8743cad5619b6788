import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { EndpointError } from "@portico/core/errors";
import type { Logger } from "@portico/core/logger";
import type { EndpointConfig } from "@portico/core/schemas";
import { healthRoute } from "./routes/health.js";

export interface EndpointAppDeps {
  endpointId: string;
  logger: Logger;
  version: string;
  startedAt: Date;
  getConfig: () => EndpointConfig;
}

interface ErrorBody {
  error: {
    code: number;
    view: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

function renderError(
  config: EndpointConfig,
  code: ContentfulStatusCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorBody {
  return {
    error: {
      code,
      view: config.renderErrors,
      message,
      ...(details !== undefined && { details }),
    },
  };
}

/**
 * Default app mounted on an endpoint's listeners. Callers add their own
 * routes with `app.route()`; failures render through the endpoint's
 * error view.
 */
export function createEndpointApp(deps: EndpointAppDeps): Hono {
  const app = new Hono();

  app.route(
    "/",
    healthRoute({
      endpointId: deps.endpointId,
      version: deps.version,
      startedAt: deps.startedAt,
      getConfig: deps.getConfig,
    }),
  );

  app.onError((err, c) => {
    const config = deps.getConfig();

    if (err instanceof HTTPException) {
      deps.logger.warn({ err }, err.message);
      return c.json(renderError(config, err.status, err.message), err.status);
    }

    deps.logger.error({ err }, "Unhandled error");

    let details: Record<string, unknown> | undefined;
    if (config.debugErrors) {
      details = {
        name: err.name,
        message: err.message,
        stack: err.stack,
        ...(err instanceof EndpointError && { errorCode: err.errorCode }),
      };
    }
    return c.json(
      renderError(config, 500, "Internal server error", details),
      500,
    );
  });

  app.notFound((c) => {
    return c.json(renderError(deps.getConfig(), 404, "Not found"), 404);
  });

  return app;
}
