/**
 * EventBus Unit Tests
 */

import { EventBus, EventEnvelope } from "../src/core/eventBus";

describe("EventBus", () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  test("should emit and record events", () => {
    const received: string[] = [];
    bus.on("RootChangeEvent", (evt) => received.push(evt.payload.rootId));

    const envelope = bus.emit("RootChangeEvent", { rootId: "r1", path: "Projects" });

    expect(received).toEqual(["r1"]);
    expect(envelope.id).toHaveLength(26);
    expect(bus.history).toHaveLength(1);
    expect(bus.history[0]?.type).toBe("RootChangeEvent");
  });

  test("should notify 'any' listeners", () => {
    const seen: EventEnvelope[] = [];
    bus.onAny((evt) => seen.push(evt));

    bus.emit("CacheEvent", { action: "clear", path: "", entries: 3 });
    bus.emit("FsOperationEvent", { operation: "stat", path: "a", durationMs: 1, ok: true });

    expect(seen.map((e) => e.type)).toEqual(["CacheEvent", "FsOperationEvent"]);
  });

  test("should support removing listeners", () => {
    let callCount = 0;
    const listener = () => {
      callCount++;
    };

    bus.on("CacheEvent", listener);
    bus.emit("CacheEvent", { action: "evict", path: "a", entries: 1 });
    bus.off("CacheEvent", listener);
    bus.emit("CacheEvent", { action: "evict", path: "a", entries: 1 });

    expect(callCount).toBe(1);
  });

  test("should isolate listener errors", () => {
    const spy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    let after = false;
    bus.on("CacheEvent", () => {
      throw new Error("Listener error");
    });
    bus.on("CacheEvent", () => {
      after = true;
    });

    expect(() => bus.emit("CacheEvent", { action: "clear", path: "", entries: 0 })).not.toThrow();
    expect(after).toBe(true);
    expect(spy).toHaveBeenCalledTimes(1);
    spy.mockRestore();
  });

  test("should bound history", () => {
    const small = new EventBus({ maxHistorySize: 2 });
    for (let i = 0; i < 5; i++) {
      small.emit("RootChangeEvent", { rootId: `r${i}` });
    }
    expect(small.history.map((e) => e.payload)).toEqual([{ rootId: "r3" }, { rootId: "r4" }]);
  });

  test("should filter history by type and limit", () => {
    bus.emit("RootChangeEvent", { rootId: "a" });
    bus.emit("CacheEvent", { action: "clear", path: "", entries: 0 });
    bus.emit("RootChangeEvent", { rootId: "b" });

    expect(bus.getHistory({ type: "RootChangeEvent" })).toHaveLength(2);
    expect(bus.getHistory({ limit: 1 })[0]?.payload).toEqual({ rootId: "b" });

    bus.clearHistory();
    expect(bus.getHistory()).toEqual([]);
  });
});
