/**
 * Notification Ledger
 *
 * Append-only record of every lifecycle notification: one row per
 * notification, never updated. A request's history is its rows in id order.
 */

import type { ToolNotification } from "@tool-agents/types";
import type { Queryable } from "./client";
import {
  NOTIFICATIONS_DDL,
  NOTIFICATIONS_TABLE,
  NotificationRowSchema,
  type NotificationRecord,
} from "./schema";

// ============================================================================
// TYPES
// ============================================================================

export interface NotificationLedger {
  append(agent: string, notification: ToolNotification): Promise<NotificationRecord>;
}

export interface NotificationQuery {
  agent?: string;
  requestId?: string;
  limit?: number;
}

const DEFAULT_LIST_LIMIT = 100;

// ============================================================================
// SCHEMA
// ============================================================================

export async function createNotificationSchema(db: Queryable): Promise<void> {
  await db.query(NOTIFICATIONS_DDL);
}

// ============================================================================
// APPEND
// ============================================================================

export function createNotificationLedger(db: Queryable): NotificationLedger {
  return {
    async append(agent, notification) {
      const result = await db.query(
        `INSERT INTO ${NOTIFICATIONS_TABLE} (agent, request_id, type, payload)
         VALUES ($1, $2, $3, $4)
         RETURNING *`,
        [agent, notification.requestId, notification.type, JSON.stringify(notification)]
      );
      const [row] = parseRows(result.rows);
      if (!row) {
        throw new Error(`Insert into ${NOTIFICATIONS_TABLE} returned no row`);
      }
      return row;
    },
  };
}

// ============================================================================
// QUERY
// ============================================================================

export async function listNotifications(
  db: Queryable,
  options: NotificationQuery = {}
): Promise<NotificationRecord[]> {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (options.agent !== undefined) {
    params.push(options.agent);
    conditions.push(`agent = $${params.length}`);
  }
  if (options.requestId !== undefined) {
    params.push(options.requestId);
    conditions.push(`request_id = $${params.length}`);
  }

  params.push(options.limit ?? DEFAULT_LIST_LIMIT);
  const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";

  const result = await db.query(
    `SELECT * FROM ${NOTIFICATIONS_TABLE} ${where} ORDER BY id ASC LIMIT $${params.length}`,
    params
  );
  return parseRows(result.rows);
}

function parseRows(rows: unknown[]): NotificationRecord[] {
  return rows.map((raw) => {
    const row = NotificationRowSchema.parse(raw);
    return {
      id: row.id,
      createdAt: row.created_at,
      agent: row.agent,
      requestId: row.request_id,
      type: row.type,
      payload: row.payload,
    };
  });
}
