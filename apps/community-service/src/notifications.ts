import { randomUUID } from "node:crypto";
import { DbClient, asRecord, parseJsonColumn, toBool, toIso } from "@community/db";
import { NotificationRow } from "./rows.js";

export const NOTIFICATION_TYPES = [
  "forum_reply",
  "forum_mention",
  "forum_quote",
  "service_interest",
  "service_response",
  "event_update",
  "event_cancelled",
  "system"
] as const;
export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export type NewNotification = {
  userId: string;
  type: NotificationType;
  title: string;
  message: string;
  data?: Record<string, unknown>;
};

export const createNotifications = async (db: DbClient, notifications: NewNotification[]) => {
  if (!notifications.length) {
    return [];
  }
  const now = new Date().toISOString();
  const rows = notifications.map((entry) => ({
    id: randomUUID(),
    user_id: entry.userId,
    type: entry.type,
    title: entry.title,
    message: entry.message,
    data: JSON.stringify(entry.data ?? {}),
    is_read: false,
    created_at: now
  }));
  await db("notifications").insert(rows);
  return rows.map((row) => row.id);
};

export const createNotification = async (db: DbClient, notification: NewNotification) =>
  (await createNotifications(db, [notification]))[0];

export const toNotificationView = (row: NotificationRow) => ({
  id: row.id,
  type: row.type,
  title: row.title,
  message: row.message,
  data: asRecord(parseJsonColumn(row.data)),
  isRead: toBool(row.is_read),
  createdAt: toIso(row.created_at)
});
