import { InvalidConfigError } from "../errors/catalog.js";
import {
  EndpointConfigSchema,
  type EndpointConfig,
} from "../schemas/endpoint-config.js";
import { buildDefaults } from "./defaults.js";
import type { ConfigSource } from "./source.js";

/**
 * Overlays the source's overrides onto the endpoint defaults and
 * validates the result. The overlay replaces whole top-level sections;
 * it does not merge inside them.
 */
export function resolveConfig(
  appId: string,
  endpointId: string,
  source: ConfigSource,
): EndpointConfig {
  const merged = {
    ...buildDefaults(appId, endpointId),
    ...source.get(appId, endpointId),
  };

  const result = EndpointConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new InvalidConfigError(
      endpointId,
      result.error.issues.map((issue) => ({
        path: issue.path.map(String).join("."),
        message: issue.message,
      })),
    );
  }
  return result.data;
}
