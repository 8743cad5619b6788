/**
 * Endpoint lifecycle manager.
 *
 * Resolves an endpoint's configuration, registers it, and binds the
 * endpoint's http and https listeners through a server adapter. A failed
 * start unwinds everything it did, so an endpoint is either fully
 * started or not registered at all.
 */

import {
  ConfigRegistry,
  resolveConfig,
  type ConfigSource,
} from "@portico/core/config";
import { ListenerStartError, PortInUseError } from "@portico/core/errors";
import {
  EndpointStateMachine,
  type EndpointState,
  type StateChangeListener,
} from "@portico/core/lifecycle";
import {
  buildListenerSpecs,
  type ListenerSpec,
} from "@portico/core/listeners";
import type { Logger } from "@portico/core/logger";
import type { EndpointConfig } from "@portico/core/schemas";
import { computeUrl } from "@portico/core/url";
import type {
  AdapterScheme,
  FetchHandler,
  ListenerHandle,
  ServerAdapter,
  StartListenerResult,
} from "../adapter/types.js";

export interface EndpointManagerOptions {
  adapter: ServerAdapter;
  source: ConfigSource;
  logger: Logger;
  /** Defaults to a registry owned by this manager. */
  registry?: ConfigRegistry;
}

const ADAPTER_SCHEMES: Record<ListenerSpec["scheme"], AdapterScheme> = {
  http: "plain",
  https: "secure",
};

export class EndpointManager {
  private readonly adapter: ServerAdapter;
  private readonly source: ConfigSource;
  private readonly logger: Logger;
  private readonly registry: ConfigRegistry;
  private readonly machines = new Map<string, EndpointStateMachine>();
  private readonly handles = new Map<string, ListenerHandle[]>();
  private readonly pendingStops = new Map<string, Promise<void>>();
  private readonly stateListeners: StateChangeListener[] = [];

  constructor(options: EndpointManagerOptions) {
    this.adapter = options.adapter;
    this.source = options.source;
    this.logger = options.logger;
    this.registry = options.registry ?? new ConfigRegistry();
  }

  /**
   * Register the endpoint's configuration and bind its enabled listeners.
   *
   * Rejects with PortInUseError or ListenerStartError when a listener
   * cannot be bound, after shutting down any listener this call bound.
   */
  async start(
    appId: string,
    endpointId: string,
    dispatch: FetchHandler,
  ): Promise<void> {
    const config = resolveConfig(appId, endpointId, this.source);
    this.registry.register(endpointId, config);

    const machine = this.machineFor(endpointId);
    machine.transition("registered");

    const log = this.logger.child({ endpoint: endpointId });
    const bound: ListenerHandle[] = [];
    try {
      for (const spec of buildListenerSpecs(endpointId, config)) {
        bound.push(await this.startListener(spec, dispatch, log));
      }
    } catch (err) {
      await this.shutdownListeners(
        bound.map((handle) => handle.ref),
        log,
      );
      this.registry.unregister(endpointId);
      machine.transition("unregistered", "start failed");
      this.machines.delete(endpointId);
      throw err;
    }

    if (bound.length > 0) {
      this.handles.set(endpointId, bound);
      machine.transition("listening");
    } else {
      log.debug("No http or https listener configured");
    }
  }

  /**
   * Shut down the endpoint's listeners and drop its configuration.
   * Adapter failures are logged, not thrown. Unknown ids are ignored, and
   * a stop already in progress is joined rather than repeated.
   */
  stop(endpointId: string): Promise<void> {
    const pending = this.pendingStops.get(endpointId);
    if (pending) return pending;

    const stopping = this.stopRegistered(endpointId).finally(() => {
      this.pendingStops.delete(endpointId);
    });
    this.pendingStops.set(endpointId, stopping);
    return stopping;
  }

  /** Stop every registered endpoint. */
  async stopAll(): Promise<void> {
    for (const endpointId of this.registry.ids()) {
      await this.stop(endpointId);
    }
  }

  /** Registered configuration. Throws if the endpoint is not registered. */
  config(endpointId: string): EndpointConfig {
    return this.registry.require(endpointId);
  }

  /** Canonical URL of a registered endpoint. */
  url(endpointId: string): string {
    return computeUrl(this.registry.require(endpointId));
  }

  listeners(endpointId: string): readonly ListenerHandle[] {
    return [...(this.handles.get(endpointId) ?? [])];
  }

  state(endpointId: string): EndpointState {
    return this.machines.get(endpointId)?.getState() ?? "unregistered";
  }

  /** Subscribe to state changes of every endpoint. Returns an unsubscribe function. */
  onStateChange(listener: StateChangeListener): () => void {
    this.stateListeners.push(listener);
    return () => {
      const idx = this.stateListeners.indexOf(listener);
      if (idx >= 0) this.stateListeners.splice(idx, 1);
    };
  }

  private machineFor(endpointId: string): EndpointStateMachine {
    const machine = new EndpointStateMachine(endpointId);
    machine.onStateChange((event) => {
      for (const listener of this.stateListeners) {
        listener(event);
      }
    });
    this.machines.set(endpointId, machine);
    return machine;
  }

  private async startListener(
    spec: ListenerSpec,
    dispatch: FetchHandler,
    log: Logger,
  ): Promise<ListenerHandle> {
    let result: StartListenerResult;
    try {
      result = await this.adapter.startListener(
        ADAPTER_SCHEMES[spec.scheme],
        spec.ref,
        dispatch,
        spec.options,
      );
    } catch (err) {
      throw new ListenerStartError(
        err instanceof Error ? err.message : String(err),
        { scheme: spec.scheme, port: spec.port },
        err,
      );
    }

    if (result.ok) {
      log.info(
        { port: result.handle.port, scheme: spec.scheme },
        `Running ${spec.endpointId} on port ${result.handle.port} (${spec.scheme})`,
      );
      return result.handle;
    }

    const { error } = result;
    if (error.kind === "address-in-use") {
      throw new PortInUseError(error.port, { scheme: spec.scheme });
    }
    throw new ListenerStartError(
      error.reason,
      { scheme: spec.scheme, port: spec.port },
      error.cause,
    );
  }

  private async stopRegistered(endpointId: string): Promise<void> {
    const config = this.registry.get(endpointId);
    const machine = this.machines.get(endpointId);
    if (!config || !machine) {
      this.logger.debug(
        { endpoint: endpointId },
        "Endpoint not registered, nothing to stop",
      );
      return;
    }

    const log = this.logger.child({ endpoint: endpointId });
    machine.transition("stopping");

    await this.shutdownListeners(
      buildListenerSpecs(endpointId, config).map((spec) => spec.ref),
      log,
    );

    this.handles.delete(endpointId);
    this.registry.unregister(endpointId);
    machine.transition("unregistered");
    this.machines.delete(endpointId);
  }

  private async shutdownListeners(refs: string[], log: Logger): Promise<void> {
    for (const ref of refs) {
      try {
        await this.adapter.stopListener(ref);
      } catch (err) {
        log.warn({ err, ref }, "Listener shutdown failed");
      }
    }
  }
}
