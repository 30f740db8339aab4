import type { ToolRequest } from "@tool-agents/types";
import type { Clock } from "./clock";
import type { RequestQueue } from "./request-queue";

export interface InFlight {
  request: ToolRequest;
  /** Monotonic milliseconds at dispatch */
  startedAt: number;
  /** Set by a cancel that arrived after dispatch; the invocation keeps running */
  cancelled: boolean;
}

/**
 * The in-flight request of one agent. Capacity is exactly one.
 */
export class ExecutionSlot {
  static readonly CAPACITY = 1;

  private readonly active = new Map<string, InFlight>();

  isFree(): boolean {
    return this.active.size < ExecutionSlot.CAPACITY;
  }

  occupy(request: ToolRequest, now: number): InFlight {
    if (!this.isFree()) {
      throw new Error(`Execution slot occupied; cannot dispatch ${request.id}`);
    }
    const entry: InFlight = { request, startedAt: now, cancelled: false };
    this.active.set(request.id, entry);
    return entry;
  }

  release(id: string): InFlight | undefined {
    const entry = this.active.get(id);
    this.active.delete(id);
    return entry;
  }

  get(id: string): InFlight | undefined {
    return this.active.get(id);
  }

  has(id: string): boolean {
    return this.active.has(id);
  }

  markCancelled(id: string): boolean {
    const entry = this.active.get(id);
    if (!entry) {
      return false;
    }
    entry.cancelled = true;
    return true;
  }

  ids(): string[] {
    return [...this.active.keys()];
  }

  get size(): number {
    return this.active.size;
  }
}

export type DispatchOutcome = "started" | "idle";

/**
 * Moves the head of the queue into the slot when the slot is free.
 * `start` must not block: it kicks off the invocation and returns.
 */
export class Dispatcher {
  constructor(
    private readonly slot: ExecutionSlot,
    private readonly clock: Clock
  ) {}

  tryDispatch(queue: RequestQueue, start: (entry: InFlight) => void): DispatchOutcome {
    if (!this.slot.isFree()) {
      return "idle";
    }

    const request = queue.dequeue();
    if (!request) {
      return "idle";
    }

    const entry = this.slot.occupy(request, this.clock.now());
    start(entry);
    return "started";
  }
}
