import { describe, it, expect, vi } from "vitest";
import {
  EndpointStateMachine,
  type StateTransitionEvent,
} from "./state-machine.js";

describe("EndpointStateMachine", () => {
  it("starts in unregistered state", () => {
    const sm = new EndpointStateMachine("Shop.Endpoint");
    expect(sm.getState()).toBe("unregistered");
  });

  it("transitions through the happy path", () => {
    const sm = new EndpointStateMachine("Shop.Endpoint");
    sm.transition("registered");
    sm.transition("listening");
    sm.transition("stopping");
    sm.transition("unregistered");
    expect(sm.getState()).toBe("unregistered");
  });

  it("stops an endpoint that never bound a listener", () => {
    const sm = new EndpointStateMachine("Shop.Endpoint");
    sm.transition("registered");
    sm.transition("stopping");
    sm.transition("unregistered");
    expect(sm.getState()).toBe("unregistered");
  });

  it("rolls back from registered after a failed start", () => {
    const sm = new EndpointStateMachine("Shop.Endpoint");
    sm.transition("registered");
    sm.transition("unregistered", "start failed");
    expect(sm.getState()).toBe("unregistered");
  });

  it("allows registering again after a full stop", () => {
    const sm = new EndpointStateMachine("Shop.Endpoint");
    sm.transition("registered");
    sm.transition("stopping");
    sm.transition("unregistered");
    expect(sm.canTransition("registered")).toBe(true);
  });

  it("rejects invalid transitions", () => {
    const sm = new EndpointStateMachine("Shop.Endpoint");
    expect(sm.canTransition("listening")).toBe(false);
    expect(() => sm.transition("listening")).toThrow(
      "Invalid state transition for Shop.Endpoint: unregistered -> listening",
    );
  });

  it("does not drop listeners without stopping", () => {
    const sm = new EndpointStateMachine("Shop.Endpoint");
    sm.transition("registered");
    sm.transition("listening");
    expect(sm.canTransition("unregistered")).toBe(false);
  });

  it("notifies listeners on state change", () => {
    const sm = new EndpointStateMachine("Shop.Endpoint");
    const events: StateTransitionEvent[] = [];
    sm.onStateChange((e) => events.push(e));

    sm.transition("registered", "config resolved");
    sm.transition("listening");

    expect(events).toHaveLength(2);
    expect(events[0].endpointId).toBe("Shop.Endpoint");
    expect(events[0].from).toBe("unregistered");
    expect(events[0].to).toBe("registered");
    expect(events[0].reason).toBe("config resolved");
    expect(events[1].from).toBe("registered");
    expect(events[1].to).toBe("listening");
    expect(events[1].reason).toBeUndefined();
  });

  it("unsubscribes listener", () => {
    const sm = new EndpointStateMachine("Shop.Endpoint");
    const listener = vi.fn();
    const unsub = sm.onStateChange(listener);

    sm.transition("registered");
    expect(listener).toHaveBeenCalledTimes(1);

    unsub();
    sm.transition("listening");
    expect(listener).toHaveBeenCalledTimes(1);
  });
});
