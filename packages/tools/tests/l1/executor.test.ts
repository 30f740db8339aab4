/**
 * L1 Tests: ToolExecutor
 *
 * Lookup, param parsing, timeout and result checking around tool calls.
 */

import { afterEach, describe, expect, test, vi } from "vitest";
import { z } from "zod";
import { ok, type InvocationContext, type Tool } from "@tool-agents/types";
import { StructuredLogger } from "@tool-agents/runtime";
import { ToolExecutor, validatorFor } from "../../src/executor";
import { regexExtractorTool } from "../../src/extract/regex_extractor";

const ctx: InvocationContext = {
  requestId: "test-request",
  isCancelled: () => false,
  reportProgress: () => undefined,
};

function quietLogger(): StructuredLogger {
  const logger = new StructuredLogger();
  logger.setOutput(() => undefined);
  return logger;
}

const echoSchema = z.object({ value: z.string(), times: z.number().default(1) });

const echoTool: Tool<z.infer<typeof echoSchema>, { echoed: string }> = {
  name: "echo",
  description: "Repeat a value",
  category: "META",
  paramsSchema: echoSchema,
  resultSchema: z.object({ echoed: z.string() }),
  async execute(params) {
    return ok({ echoed: params.value.repeat(params.times) });
  },
};

describe("L1: ToolExecutor", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test("runs a registered tool with schema defaults applied", async () => {
    const executor = new ToolExecutor({ tools: [echoTool], logger: quietLogger() });

    expect(await executor.execute("echo", { value: "ab" }, ctx)).toEqual({ success: true, data: { echoed: "ab" } });
    expect(await executor.execute("echo", { value: "ab", times: 2 }, ctx)).toEqual({
      success: true,
      data: { echoed: "abab" },
    });
  });

  test("passes the tool name into the tool context", async () => {
    const execute = vi.fn(async () => ok({ echoed: "x" }));
    const executor = new ToolExecutor({ tools: [{ ...echoTool, execute }], logger: quietLogger() });

    await executor.execute("echo", { value: "x" }, ctx);

    expect(execute).toHaveBeenCalledWith({ value: "x", times: 1 }, expect.objectContaining({ tool: "echo", requestId: "test-request" }));
  });

  test("unknown tools fail without throwing", async () => {
    const executor = new ToolExecutor({ tools: [], logger: quietLogger() });

    expect(await executor.execute("nope", {}, ctx)).toEqual({
      success: false,
      error: { code: "unknown_tool", message: "Unknown tool: nope", recoverable: false },
    });
  });

  test("invalid params fail with the schema issue", async () => {
    const executor = new ToolExecutor({ tools: [echoTool], logger: quietLogger() });

    const result = await executor.execute("echo", { value: 3 }, ctx);

    expect(!result.success && result.error.code).toBe("invalid_params");
    expect(!result.success && result.error.message).toMatch(/^value: /);
  });

  test("a thrown tool error becomes tool_exception", async () => {
    const executor = new ToolExecutor({
      tools: [
        {
          ...echoTool,
          execute: async () => {
            throw new Error("disk on fire");
          },
        },
      ],
      logger: quietLogger(),
    });

    expect(await executor.execute("echo", { value: "x" }, ctx)).toEqual({
      success: false,
      error: { code: "tool_exception", message: "disk on fire", recoverable: false },
    });
  });

  test("a result that breaks the result schema is rejected", async () => {
    const executor = new ToolExecutor({
      tools: [{ ...echoTool, resultSchema: z.object({ echoed: z.number() }) }],
      logger: quietLogger(),
    });

    const result = await executor.execute("echo", { value: "x" }, ctx);

    expect(!result.success && result.error.code).toBe("invalid_result");
  });

  test("a slow tool times out", async () => {
    vi.useFakeTimers();
    const executor = new ToolExecutor({
      tools: [{ ...echoTool, execute: () => new Promise<never>(() => undefined) }],
      timeoutMs: 1_000,
      logger: quietLogger(),
    });

    const pending = executor.execute("echo", { value: "x" }, ctx);
    await vi.advanceTimersByTimeAsync(1_000);

    expect(await pending).toEqual({
      success: false,
      error: { code: "timeout", message: "Tool echo timed out after 1000ms", recoverable: true },
    });
  });

  test("validatorFor passes valid params through unchanged", async () => {
    const validate = validatorFor(regexExtractorTool);

    expect(await validate({ content: "x", pattern: "x" })).toEqual({
      success: true,
      data: { content: "x", pattern: "x" },
    });
    const rejected = await validate({ content: "x" });
    expect(rejected).toEqual({
      success: false,
      error: { code: "invalid_params", message: "pattern: Required", recoverable: false },
    });
  });
});
