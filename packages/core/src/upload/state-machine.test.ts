import { describe, it, expect, vi } from "vitest";
import { ShardStateMachine, type ShardTransitionEvent } from "./state-machine.js";

describe("ShardStateMachine", () => {
  it("starts pending with no attempts", () => {
    const sm = new ShardStateMachine(0);
    expect(sm.getState()).toBe("pending");
    expect(sm.getAttempts()).toBe(0);
  });

  it("transitions through the happy path", () => {
    const sm = new ShardStateMachine(0);
    sm.transition("assembling");
    sm.transition("transmitting");
    sm.transition("committed");

    expect(sm.getState()).toBe("committed");
    expect(sm.getAttempts()).toBe(1);
  });

  it("rejects skipping assembly", () => {
    const sm = new ShardStateMachine(4);
    expect(sm.canTransition("transmitting")).toBe(false);
    expect(() => sm.transition("committed")).toThrow(
      "Invalid shard 4 transition: pending -> committed",
    );
  });

  it("retries from failed into either assembling or transmitting", () => {
    const sm = new ShardStateMachine(0);
    sm.transition("assembling");
    sm.transition("failed");
    expect(sm.canTransition("assembling")).toBe(true);
    expect(sm.canTransition("transmitting")).toBe(true);
    expect(sm.canTransition("committed")).toBe(false);

    sm.transition("transmitting");
    expect(sm.getAttempts()).toBe(2);
  });

  it("does not allow transitions from committed", () => {
    const sm = new ShardStateMachine(0);
    sm.transition("assembling");
    sm.transition("transmitting");
    sm.transition("committed");

    expect(sm.canTransition("failed")).toBe(false);
    expect(sm.canTransition("assembling")).toBe(false);
  });

  it("notifies listeners with shard index and attempt", () => {
    const sm = new ShardStateMachine(3);
    const events: ShardTransitionEvent[] = [];
    sm.onStateChange((e) => events.push(e));

    sm.transition("assembling");
    sm.transition("failed", "disk gone");

    expect(events.map((e) => [e.from, e.to, e.attempt, e.reason])).toEqual([
      ["pending", "assembling", 1, undefined],
      ["assembling", "failed", 1, "disk gone"],
    ]);
    expect(events[0]?.shardIndex).toBe(3);
  });

  it("unsubscribes listener", () => {
    const sm = new ShardStateMachine(0);
    const listener = vi.fn();
    const unsub = sm.onStateChange(listener);

    sm.transition("assembling");
    unsub();
    sm.transition("transmitting");

    expect(listener).toHaveBeenCalledTimes(1);
  });
});
