import { z } from "zod";

export const DEFAULTS = {
  logging: {
    level: "info" as const,
    pretty: false,
  },
  apps: {},
};

export const LoggingConfigSchema = z.object({
  level: z
    .enum(["fatal", "error", "warn", "info", "debug"])
    .default(DEFAULTS.logging.level),
  pretty: z.boolean().default(DEFAULTS.logging.pretty),
});

/**
 * Per-endpoint overrides stay raw here. They are overlaid onto the
 * endpoint defaults and validated when the endpoint is resolved.
 */
export const EndpointOverridesSchema = z.record(z.string(), z.unknown());

export const PorticoConfigSchema = z.object({
  logging: LoggingConfigSchema.default(DEFAULTS.logging),
  apps: z
    .record(
      z.string().min(1).describe("Application id"),
      z.record(
        z.string().min(1).describe("Endpoint id"),
        EndpointOverridesSchema,
      ),
    )
    .default(DEFAULTS.apps),
});

export type PorticoConfig = z.infer<typeof PorticoConfigSchema>;
export type LoggingConfig = PorticoConfig["logging"];
