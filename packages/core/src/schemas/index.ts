export {
  ENDPOINT_DEFAULTS,
  PortSchema,
  ListenerOptionsSchema,
  UrlConfigSchema,
  TransportsConfigSchema,
  EndpointConfigSchema,
  type EndpointConfig,
  type EndpointOverrides,
  type ListenerOptions,
  type UrlConfig,
  type TransportsConfig,
} from "./endpoint-config.js";
export {
  DEFAULTS,
  LoggingConfigSchema,
  EndpointOverridesSchema,
  PorticoConfigSchema,
  type PorticoConfig,
  type LoggingConfig,
} from "./portico-config.js";
