export {
  DEFAULT_PORTS,
  buildListenerSpec,
  buildListenerSpecs,
  listenerOptions,
  listenerRef,
  type ListenerScheme,
  type ListenerSpec,
} from "./spec.js";
