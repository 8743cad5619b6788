export {
  EndpointStateMachine,
  type EndpointState,
  type StateTransitionEvent,
  type StateChangeListener,
} from "./state-machine.js";
