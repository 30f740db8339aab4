/**
 * L1 Tests: AgentRegistry and the stock agent catalog
 */

import { beforeEach, describe, expect, test } from "vitest";
import { ManualClock, StructuredLogger } from "@tool-agents/runtime";
import { SignalBus } from "../../src/bus";
import { AgentRegistry } from "../../src/registry";
import { createCatalogAgents, createToolAgent } from "../../src/catalog";
import type { OutgoingSignal } from "../../src/signals";
import { regexExtractorTool, todoExtractorTool } from "@tool-agents/tools";

let bus: SignalBus;
let published: OutgoingSignal[];
let logger: StructuredLogger;

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("L1: AgentRegistry", () => {
  beforeEach(() => {
    logger = new StructuredLogger();
    logger.setOutput(() => undefined);
    bus = new SignalBus(logger);
    published = [];
    bus.subscribe((signal) => {
      published.push(signal);
    });
  });

  test("the catalog builds every stock agent", () => {
    const registry = new AgentRegistry();
    for (const agent of createCatalogAgents({ bus, logger })) {
      registry.register(agent);
    }

    expect(registry.list()).toEqual([
      { name: "repo_search_agent", tool: "repo_search", description: expect.any(String) },
      { name: "regex_extractor_agent", tool: "regex_extractor", description: expect.any(String) },
      { name: "todo_extractor_agent", tool: "todo_extractor", description: expect.any(String) },
    ]);
  });

  test("disabled agents are skipped and settings reach the lifecycle", () => {
    const agents = createCatalogAgents({
      bus,
      logger,
      agents: {
        todo_extractor_agent: { enabled: false },
        regex_extractor_agent: { rateLimitMax: 1, cacheTtlMs: 5_000 },
      },
    });

    expect(agents.map((a) => a.name)).toEqual(["repo_search_agent", "regex_extractor_agent"]);
    expect(agents[1].lifecycle.config).toEqual({ cacheTtlMs: 5_000, rateLimitWindowMs: 60_000, rateLimitMax: 1 });
  });

  test("rejects duplicate registrations", () => {
    const registry = new AgentRegistry();
    registry.register(createToolAgent(todoExtractorTool, { bus, logger }));

    expect(() => registry.register(createToolAgent(todoExtractorTool, { bus, logger }))).toThrow(
      "Agent already registered: todo_extractor_agent"
    );
  });

  test("routing to an unknown agent fails", () => {
    const registry = new AgentRegistry();

    expect(() => registry.get("nobody")).toThrow("Unknown agent: nobody");
    expect(registry.has("nobody")).toBe(false);
  });

  test("routes signals end to end and serves repeats from cache", async () => {
    const registry = new AgentRegistry();
    registry.register(createToolAgent(regexExtractorTool, { bus, logger, clock: new ManualClock(0) }));

    const signal = { type: "tool_request", params: { content: "a1 b22", pattern: "\\d+" } };
    await registry.send("regex_extractor_agent", signal);
    await registry.drain();
    const second = await registry.send("regex_extractor_agent", signal);

    expect(second).toMatchObject({ type: "tool_request", receipt: { status: "cache_hit" } });
    const results = published.filter((s) => s.type === "result");
    expect(results).toHaveLength(2);
    expect(results[0]).toMatchObject({
      agent: "regex_extractor_agent",
      fromCache: false,
      result: {
        matches: [
          { match: "1", index: 1, line: 1, groups: [] },
          { match: "22", index: 4, line: 1, groups: [] },
        ],
        totalMatches: 2,
        truncated: false,
      },
    });
    expect(results[1]).toMatchObject({ fromCache: true });
    expect(registry.metrics().regex_extractor_agent).toMatchObject({ total: 1, cacheHits: 1 });
  });

  test("invalid tool params become a validation error signal", async () => {
    const registry = new AgentRegistry();
    registry.register(createToolAgent(regexExtractorTool, { bus, logger }));

    await registry.send("regex_extractor_agent", {
      type: "tool_request",
      requestId: "bad",
      params: { content: "x" },
    });
    await registry.drain();
    await flush();

    expect(published.find((s) => s.type === "error")).toMatchObject({
      requestId: "bad",
      code: "VALIDATION_ERROR",
      error: "Validation failed: pattern: Required",
      toolErrorCode: "invalid_params",
    });
  });
});
