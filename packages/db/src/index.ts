/**
 * Tool Agents persistence
 */

export { createPool, fromPool, type Queryable, type QueryRows } from "./client";
export {
  createNotificationLedger,
  createNotificationSchema,
  listNotifications,
  type NotificationLedger,
  type NotificationQuery,
} from "./ledger";
export { NOTIFICATIONS_TABLE, NotificationRowSchema, type NotificationRecord } from "./schema";
