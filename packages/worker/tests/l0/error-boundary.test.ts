/**
 * L0 Tests: error boundary helpers
 */

import { describe, expect, test } from "vitest";
import { OperationalError, getLogger } from "@tool-agents/runtime";
import {
  createErrorReport,
  isTestEnvironment,
  safeExecute,
  setupErrorBoundary,
} from "../../src/error-boundary";

describe("L0: error boundary", () => {
  test("is not installed under the test runner", () => {
    expect(isTestEnvironment()).toBe(true);
    expect(setupErrorBoundary()).toBe(false);
  });

  test("detects test runners from the environment", () => {
    expect(isTestEnvironment({ NODE_ENV: "test" })).toBe(true);
    expect(isTestEnvironment({ NODE_ENV: "production" })).toBe(false);
  });

  test("operational errors are warnings and keep their context", () => {
    const report = createErrorReport(
      new OperationalError("Unknown agent: x", "UNKNOWN_AGENT", { agent: "x" }),
      "operational"
    );

    expect(report).toMatchObject({
      type: "operational",
      severity: "warning",
      message: "Unknown agent: x",
      context: { agent: "x" },
    });
  });

  test("uncaught errors are critical", () => {
    expect(createErrorReport(new Error("boom"), "uncaught").severity).toBe("critical");
    expect(createErrorReport(new Error("boom"), "programmer").severity).toBe("error");
  });

  test("safeExecute returns results and captures failures", async () => {
    getLogger().setOutput(() => undefined);

    expect(await safeExecute(async () => 42)).toEqual({ success: true, data: 42 });

    const failed = await safeExecute(async () => {
      throw new Error("nope");
    });
    expect(failed.success).toBe(false);
    expect(!failed.success && failed.error.message).toBe("nope");
  });
});
