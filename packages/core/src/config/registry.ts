import {
  EndpointAlreadyRegisteredError,
  EndpointNotRegisteredError,
} from "../errors/catalog.js";
import type { EndpointConfig } from "../schemas/endpoint-config.js";

/**
 * Resolved configuration of running endpoints, keyed by endpoint id.
 *
 * One instance is owned by whoever supervises the endpoints; tests
 * create their own. No locking: callers serialize writes per id.
 */
export class ConfigRegistry {
  private readonly configs = new Map<string, EndpointConfig>();

  /** Throws if the id is already registered. */
  register(endpointId: string, config: EndpointConfig): void {
    if (this.configs.has(endpointId)) {
      throw new EndpointAlreadyRegisteredError(endpointId);
    }
    this.configs.set(endpointId, config);
  }

  /** Replace the config of a registered endpoint. */
  update(endpointId: string, config: EndpointConfig): void {
    if (!this.configs.has(endpointId)) {
      throw new EndpointNotRegisteredError(endpointId);
    }
    this.configs.set(endpointId, config);
  }

  get(endpointId: string): EndpointConfig | undefined {
    return this.configs.get(endpointId);
  }

  require(endpointId: string): EndpointConfig {
    const config = this.configs.get(endpointId);
    if (!config) {
      throw new EndpointNotRegisteredError(endpointId);
    }
    return config;
  }

  has(endpointId: string): boolean {
    return this.configs.has(endpointId);
  }

  /** Returns true if the id was registered. */
  unregister(endpointId: string): boolean {
    return this.configs.delete(endpointId);
  }

  ids(): string[] {
    return [...this.configs.keys()];
  }
}
