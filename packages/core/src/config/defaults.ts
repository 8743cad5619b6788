import { join } from "node:path";
import { homedir } from "node:os";
import {
  ENDPOINT_DEFAULTS,
  type EndpointConfig,
} from "../schemas/endpoint-config.js";

export const DEFAULT_ROOT_PATH = join(homedir(), ".portico");
export const CONFIG_FILE_NAME = "config.json";

const ERROR_VIEW_SUFFIX = "ErrorView";

/**
 * Error view for an endpoint: its top-level namespace plus `ErrorView`,
 * so `Shop.Web.Endpoint` renders errors through `Shop.ErrorView`.
 */
export function errorViewFor(endpointId: string): string {
  const [namespace] = endpointId.split(".");
  return `${namespace}.${ERROR_VIEW_SUFFIX}`;
}

/** Static defaults every endpoint starts from before overrides apply. */
export function buildDefaults(
  appId: string,
  endpointId: string,
): EndpointConfig {
  return {
    appId,
    debugErrors: ENDPOINT_DEFAULTS.debugErrors,
    renderErrors: errorViewFor(endpointId),
    transports: { ...ENDPOINT_DEFAULTS.transports },
    url: { ...ENDPOINT_DEFAULTS.url },
    http: ENDPOINT_DEFAULTS.http,
    https: ENDPOINT_DEFAULTS.https,
    secretKeyBase: ENDPOINT_DEFAULTS.secretKeyBase,
  };
}
