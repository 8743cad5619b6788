import type { EndpointConfig } from "../schemas/endpoint-config.js";
import { listenerOptions } from "../listeners/spec.js";

/**
 * Canonical external URL of an endpoint.
 *
 * Scheme and port come from the https section, else the http section,
 * else `http` on 80. Each of `url.scheme`, `url.host` and `url.port`
 * overrides what was derived. Default ports for the scheme are omitted.
 */
export function computeUrl(
  config: Pick<EndpointConfig, "url" | "http" | "https">,
): string {
  const https = listenerOptions(config, "https");
  const http = listenerOptions(config, "http");
  const [derivedScheme, derivedPort]: [string, number] = https
    ? ["https", https.port]
    : http
      ? ["http", http.port]
      : ["http", 80];

  const scheme = config.url.scheme ?? derivedScheme;
  const port = String(config.url.port ?? derivedPort);
  const host = config.url.host;
  const path = config.url.path ?? "";

  if (
    (scheme === "https" && port === "443") ||
    (scheme === "http" && port === "80")
  ) {
    return `${scheme}://${host}${path}`;
  }
  return `${scheme}://${host}:${port}${path}`;
}
