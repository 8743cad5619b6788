import type { EndpointOverrides } from "../schemas/endpoint-config.js";
import type { PorticoConfig } from "../schemas/portico-config.js";

/**
 * Read access to per-application, per-endpoint overrides.
 * Returns `undefined` when nothing is configured for the pair.
 */
export interface ConfigSource {
  get(appId: string, endpointId: string): EndpointOverrides | undefined;
}

/** Mutable in-memory source. Later `set` calls replace earlier ones. */
export class MemoryConfigSource implements ConfigSource {
  private readonly apps = new Map<string, Map<string, EndpointOverrides>>();

  constructor(initial?: PorticoConfig["apps"]) {
    for (const [appId, endpoints] of Object.entries(initial ?? {})) {
      for (const [endpointId, overrides] of Object.entries(endpoints)) {
        this.set(appId, endpointId, overrides);
      }
    }
  }

  get(appId: string, endpointId: string): EndpointOverrides | undefined {
    return this.apps.get(appId)?.get(endpointId);
  }

  set(appId: string, endpointId: string, overrides: EndpointOverrides): void {
    let endpoints = this.apps.get(appId);
    if (!endpoints) {
      endpoints = new Map();
      this.apps.set(appId, endpoints);
    }
    endpoints.set(endpointId, { ...overrides });
  }

  delete(appId: string, endpointId: string): boolean {
    return this.apps.get(appId)?.delete(endpointId) ?? false;
  }

  /** Every configured `[appId, endpointId]` pair, in insertion order. */
  entries(): Array<[appId: string, endpointId: string]> {
    const pairs: Array<[string, string]> = [];
    for (const [appId, endpoints] of this.apps) {
      for (const endpointId of endpoints.keys()) {
        pairs.push([appId, endpointId]);
      }
    }
    return pairs;
  }
}

/** Source backed by the `apps` section of a loaded config file. */
export function createFileConfigSource(
  config: PorticoConfig,
): MemoryConfigSource {
  return new MemoryConfigSource(config.apps);
}
