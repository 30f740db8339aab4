/**
 * L1 Tests: notification ledger
 *
 * Runs against an in-process Queryable that records every statement.
 */

import { describe, expect, test, vi } from "vitest";
import type { ToolNotification } from "@tool-agents/types";
import type { Queryable } from "../../src/client";
import { createNotificationLedger, createNotificationSchema, listNotifications } from "../../src/ledger";

function fakeDb(rows: unknown[] = []) {
  const query = vi.fn(async (_text: string, _values?: unknown[]) => ({ rows }));
  const db: Queryable = { query };
  return { db, query };
}

const started: ToolNotification = { type: "started", requestId: "r1", tool: "regex_extractor" };

describe("L1: notification ledger", () => {
  test("creates the table idempotently", async () => {
    const { db, query } = fakeDb();

    await createNotificationSchema(db);

    expect(query).toHaveBeenCalledTimes(1);
    expect(query.mock.calls[0][0]).toContain("CREATE TABLE IF NOT EXISTS tool_notifications");
  });

  test("appends one row per notification", async () => {
    const { db, query } = fakeDb([
      {
        id: "7",
        created_at: new Date("2026-01-02T03:04:05.000Z"),
        agent: "regex_extractor_agent",
        request_id: "r1",
        type: "started",
        payload: { type: "started", requestId: "r1", tool: "regex_extractor" },
      },
    ]);
    const ledger = createNotificationLedger(db);

    const record = await ledger.append("regex_extractor_agent", started);

    expect(query.mock.calls[0][1]).toEqual([
      "regex_extractor_agent",
      "r1",
      "started",
      '{"type":"started","requestId":"r1","tool":"regex_extractor"}',
    ]);
    expect(record).toEqual({
      id: "7",
      createdAt: "2026-01-02T03:04:05.000Z",
      agent: "regex_extractor_agent",
      requestId: "r1",
      type: "started",
      payload: { type: "started", requestId: "r1", tool: "regex_extractor" },
    });
  });

  test("fails when the insert returns nothing", async () => {
    const { db } = fakeDb([]);

    await expect(createNotificationLedger(db).append("a", started)).rejects.toThrow(
      "Insert into tool_notifications returned no row"
    );
  });

  test("filters by agent and request in insertion order", async () => {
    const { db, query } = fakeDb();

    await listNotifications(db, { agent: "a", requestId: "r1", limit: 5 });

    expect(query).toHaveBeenCalledWith(
      "SELECT * FROM tool_notifications WHERE agent = $1 AND request_id = $2 ORDER BY id ASC LIMIT $3",
      ["a", "r1", 5]
    );
  });

  test("lists without filters using the default limit", async () => {
    const { db, query } = fakeDb([
      { id: 1, created_at: "2026-01-02T03:04:05Z", agent: "a", request_id: "r1", type: "cancelled", payload: {} },
    ]);

    const records = await listNotifications(db);

    expect(query.mock.calls[0][1]).toEqual([100]);
    expect(query.mock.calls[0][0]).not.toContain("WHERE");
    expect(records).toEqual([
      { id: "1", createdAt: "2026-01-02T03:04:05Z", agent: "a", requestId: "r1", type: "cancelled", payload: {} },
    ]);
  });

  test("rejects rows that do not match the table shape", async () => {
    const { db } = fakeDb([{ id: "1", agent: "a" }]);

    await expect(listNotifications(db)).rejects.toThrow();
  });
});
