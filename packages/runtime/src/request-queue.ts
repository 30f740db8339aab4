import type { Priority, ToolRequest } from "@tool-agents/types";

const PRIORITY_RANK: Record<Priority, number> = {
  high: 0,
  normal: 1,
  low: 2,
};

/**
 * Pending requests ordered by priority, insertion order within a tier.
 */
export class RequestQueue {
  private items: ToolRequest[] = [];

  enqueue(request: ToolRequest): void {
    this.items.push(request);
    // Array.prototype.sort is stable, so equal ranks keep insertion order
    this.items.sort((a, b) => PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority]);
  }

  dequeue(): ToolRequest | undefined {
    return this.items.shift();
  }

  peek(): ToolRequest | undefined {
    return this.items[0];
  }

  /**
   * Remove a pending request. Returns false when the id is not queued
   * (already dispatched, completed, or never submitted).
   */
  remove(id: string): boolean {
    const index = this.items.findIndex((r) => r.id === id);
    if (index === -1) {
      return false;
    }
    this.items.splice(index, 1);
    return true;
  }

  has(id: string): boolean {
    return this.items.some((r) => r.id === id);
  }

  ids(): string[] {
    return this.items.map((r) => r.id);
  }

  get length(): number {
    return this.items.length;
  }
}
