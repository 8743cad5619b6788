import { z } from "zod";

export const ENDPOINT_DEFAULTS = {
  debugErrors: false,
  transports: {
    longpollerWindowMs: 10_000,
    websocketSerializer: "json",
  },
  url: {
    host: "localhost",
  },
  http: false as const,
  https: false as const,
  secretKeyBase: null,
};

/**
 * A TCP port given as an integer or as a string of digits.
 * Parsed output is always an integer.
 */
export const PortSchema = z
  .union([z.number().int(), z.string().regex(/^\d+$/, "Port must be numeric")])
  .transform((value) =>
    typeof value === "string" ? Number.parseInt(value, 10) : value,
  )
  .pipe(z.number().int().min(0).max(65535));

/**
 * Options for one listener. Keys beyond the ones named here are
 * passed through to the server adapter untouched.
 */
export const ListenerOptionsSchema = z.looseObject({
  port: PortSchema.optional(),
  ip: z.string().min(1).optional().describe("Bind address"),
  keyfile: z.string().min(1).optional(),
  certfile: z.string().min(1).optional(),
  key: z.string().min(1).optional().describe("Inline PEM private key"),
  cert: z.string().min(1).optional().describe("Inline PEM certificate"),
});

const ListenerSectionSchema = z
  .union([z.literal(false), ListenerOptionsSchema])
  .default(false);

export const UrlConfigSchema = z.object({
  scheme: z.enum(["http", "https"]).optional(),
  host: z.string().min(1).default(ENDPOINT_DEFAULTS.url.host),
  port: PortSchema.optional(),
  path: z.string().startsWith("/").optional(),
});

export const TransportsConfigSchema = z.object({
  longpollerWindowMs: z
    .number()
    .int()
    .positive()
    .default(ENDPOINT_DEFAULTS.transports.longpollerWindowMs),
  websocketSerializer: z
    .string()
    .min(1)
    .default(ENDPOINT_DEFAULTS.transports.websocketSerializer),
});

export const EndpointConfigSchema = z.object({
  appId: z.string().min(1),
  debugErrors: z.boolean().default(ENDPOINT_DEFAULTS.debugErrors),
  renderErrors: z
    .string()
    .min(1)
    .describe("Error view that renders failed requests"),
  transports: TransportsConfigSchema.default(ENDPOINT_DEFAULTS.transports),
  url: UrlConfigSchema.default(ENDPOINT_DEFAULTS.url),
  http: ListenerSectionSchema,
  https: ListenerSectionSchema,
  secretKeyBase: z
    .string()
    .min(1)
    .nullable()
    .default(ENDPOINT_DEFAULTS.secretKeyBase),
});

export type EndpointConfig = z.infer<typeof EndpointConfigSchema>;
export type ListenerOptions = z.infer<typeof ListenerOptionsSchema>;
export type UrlConfig = z.infer<typeof UrlConfigSchema>;
export type TransportsConfig = z.infer<typeof TransportsConfigSchema>;

/** Raw, unvalidated overrides for one endpoint as read from a config source. */
export type EndpointOverrides = Record<string, unknown>;
