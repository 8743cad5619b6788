export { EndpointManager, type EndpointManagerOptions } from "./endpoint/manager.js";
export {
  NodeServerAdapter,
  type NodeServerAdapterOptions,
} from "./adapter/node.js";
export type {
  AdapterListenerOptions,
  AdapterScheme,
  FetchHandler,
  ListenerHandle,
  ListenerStartFailure,
  ServerAdapter,
  StartListenerResult,
} from "./adapter/types.js";
export { createEndpointApp, type EndpointAppDeps } from "./app.js";
