/**
 * L0 Tests: RequestQueue and Dispatcher
 */

import { describe, expect, test, vi } from "vitest";
import type { Priority, ToolRequest } from "@tool-agents/types";
import { RequestQueue } from "../../src/request-queue";
import { Dispatcher, ExecutionSlot } from "../../src/execution-slot";
import { ManualClock } from "../../src/clock";

function request(id: string, priority: Priority): ToolRequest {
  return { id, params: { id }, priority, createdAt: 0, cacheKey: `key-${id}` };
}

describe("L0: RequestQueue", () => {
  test("dequeues by priority: low, high, normal submitted → high, normal, low", () => {
    const queue = new RequestQueue();
    queue.enqueue(request("A", "low"));
    queue.enqueue(request("B", "high"));
    queue.enqueue(request("C", "normal"));

    expect(queue.dequeue()?.id).toBe("B");
    expect(queue.dequeue()?.id).toBe("C");
    expect(queue.dequeue()?.id).toBe("A");
    expect(queue.dequeue()).toBeUndefined();
  });

  test("keeps insertion order within a priority tier", () => {
    const queue = new RequestQueue();
    queue.enqueue(request("n1", "normal"));
    queue.enqueue(request("h1", "high"));
    queue.enqueue(request("n2", "normal"));
    queue.enqueue(request("h2", "high"));
    queue.enqueue(request("n3", "normal"));

    expect(queue.ids()).toEqual(["h1", "h2", "n1", "n2", "n3"]);
  });

  test("remove drops a pending request and ignores unknown ids", () => {
    const queue = new RequestQueue();
    queue.enqueue(request("a", "normal"));
    queue.enqueue(request("b", "normal"));

    expect(queue.remove("a")).toBe(true);
    expect(queue.remove("a")).toBe(false);
    expect(queue.remove("missing")).toBe(false);
    expect(queue.ids()).toEqual(["b"]);
    expect(queue.length).toBe(1);
  });
});

describe("L0: Dispatcher", () => {
  test("starts the head of the queue when the slot is free", () => {
    const queue = new RequestQueue();
    const slot = new ExecutionSlot();
    const dispatcher = new Dispatcher(slot, new ManualClock(42));
    const start = vi.fn();
    queue.enqueue(request("low", "low"));
    queue.enqueue(request("high", "high"));

    expect(dispatcher.tryDispatch(queue, start)).toBe("started");
    expect(start).toHaveBeenCalledTimes(1);
    expect(start.mock.calls[0][0]).toMatchObject({
      request: { id: "high" },
      startedAt: 42,
      cancelled: false,
    });
    expect(slot.ids()).toEqual(["high"]);
    expect(queue.ids()).toEqual(["low"]);
  });

  test("stays idle while the slot is occupied", () => {
    const queue = new RequestQueue();
    const slot = new ExecutionSlot();
    const dispatcher = new Dispatcher(slot, new ManualClock());
    const start = vi.fn();
    queue.enqueue(request("a", "normal"));
    queue.enqueue(request("b", "normal"));

    dispatcher.tryDispatch(queue, start);

    expect(dispatcher.tryDispatch(queue, start)).toBe("idle");
    expect(start).toHaveBeenCalledTimes(1);
    expect(queue.ids()).toEqual(["b"]);
  });

  test("stays idle on an empty queue", () => {
    const dispatcher = new Dispatcher(new ExecutionSlot(), new ManualClock());
    const start = vi.fn();

    expect(dispatcher.tryDispatch(new RequestQueue(), start)).toBe("idle");
    expect(start).not.toHaveBeenCalled();
  });

  test("slot frees on release and tracks cancellation flags", () => {
    const slot = new ExecutionSlot();
    slot.occupy(request("a", "normal"), 0);

    expect(() => slot.occupy(request("b", "normal"), 0)).toThrow(/occupied/);
    expect(slot.markCancelled("a")).toBe(true);
    expect(slot.get("a")?.cancelled).toBe(true);
    expect(slot.markCancelled("b")).toBe(false);

    slot.release("a");
    expect(slot.isFree()).toBe(true);
    expect(slot.size).toBe(0);
  });
});
