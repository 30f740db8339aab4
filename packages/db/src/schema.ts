/**
 * Row types for tool_notifications
 */

import { z } from "zod";
import { JsonObjectSchema, type JsonObject } from "@tool-agents/types";

export const NOTIFICATIONS_TABLE = "tool_notifications";

export const NOTIFICATIONS_DDL = `
  CREATE TABLE IF NOT EXISTS ${NOTIFICATIONS_TABLE} (
    id BIGSERIAL PRIMARY KEY,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    agent TEXT NOT NULL,
    request_id TEXT NOT NULL,
    type TEXT NOT NULL,
    payload JSONB NOT NULL DEFAULT '{}'
  );

  CREATE INDEX IF NOT EXISTS idx_tool_notifications_agent ON ${NOTIFICATIONS_TABLE}(agent, id);
  CREATE INDEX IF NOT EXISTS idx_tool_notifications_request ON ${NOTIFICATIONS_TABLE}(request_id, id);
`;

// pg returns BIGSERIAL as a string and TIMESTAMPTZ as a Date
export const NotificationRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  created_at: z.union([z.date(), z.string()]).transform((v) => (v instanceof Date ? v.toISOString() : v)),
  agent: z.string(),
  request_id: z.string(),
  type: z.string(),
  payload: JsonObjectSchema,
});

export interface NotificationRecord {
  id: string;
  createdAt: string;
  agent: string;
  requestId: string;
  type: string;
  payload: JsonObject;
}
