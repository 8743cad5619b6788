import type {
  EndpointConfig,
  ListenerOptions,
} from "../schemas/endpoint-config.js";

export type ListenerScheme = "http" | "https";

/** Port bound when a listener section leaves `port` unset. */
export const DEFAULT_PORTS: Readonly<Record<ListenerScheme, number>> = {
  http: 4000,
  https: 4040,
};

export interface ListenerSpec {
  scheme: ListenerScheme;
  endpointId: string;
  /** Scheme-qualified id the adapter knows the listener by. */
  ref: string;
  port: number;
  options: ListenerOptions & { port: number };
}

export function listenerRef(endpointId: string, scheme: ListenerScheme): string {
  return `${endpointId}.${scheme.toUpperCase()}`;
}

/**
 * Effective options for one scheme, or null when the section is disabled.
 * https inherits every http option it does not set itself.
 */
export function listenerOptions(
  config: Pick<EndpointConfig, "http" | "https">,
  scheme: ListenerScheme,
): (ListenerOptions & { port: number }) | null {
  let merged: ListenerOptions;
  if (scheme === "http") {
    if (!config.http) return null;
    merged = { ...config.http };
  } else {
    if (!config.https) return null;
    merged = { ...(config.http || {}), ...config.https };
  }
  return { ...merged, port: merged.port ?? DEFAULT_PORTS[scheme] };
}

export function buildListenerSpec(
  endpointId: string,
  config: Pick<EndpointConfig, "http" | "https">,
  scheme: ListenerScheme,
): ListenerSpec | null {
  const options = listenerOptions(config, scheme);
  if (!options) return null;
  return {
    scheme,
    endpointId,
    ref: listenerRef(endpointId, scheme),
    port: options.port,
    options,
  };
}

/** Specs for every enabled scheme, http first. */
export function buildListenerSpecs(
  endpointId: string,
  config: Pick<EndpointConfig, "http" | "https">,
): ListenerSpec[] {
  const specs: ListenerSpec[] = [];
  for (const scheme of ["http", "https"] as const) {
    const spec = buildListenerSpec(endpointId, config, scheme);
    if (spec) specs.push(spec);
  }
  return specs;
}
