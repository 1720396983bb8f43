import { DbClient, toBool, toIso, toIsoOrNull } from "@community/db";
import { UserRow } from "./rows.js";

export type PublicUser = {
  id: string;
  displayName: string;
  profileImageUrl: string | null;
  email?: string;
  firstName?: string | null;
  lastName?: string | null;
  bio?: string | null;
  location?: string | null;
  createdAt?: string;
};

/** Fields the owner has marked private are left out entirely. */
export const toPublicUser = (row: UserRow): PublicUser => {
  const view: PublicUser = {
    id: row.id,
    displayName: row.display_name,
    profileImageUrl: row.profile_image_url
  };
  if (!toBool(row.email_private)) view.email = row.email;
  if (!toBool(row.first_name_private)) view.firstName = row.first_name;
  if (!toBool(row.last_name_private)) view.lastName = row.last_name;
  if (!toBool(row.bio_private)) view.bio = row.bio;
  if (!toBool(row.location_private)) view.location = row.location;
  if (!toBool(row.created_at_private)) view.createdAt = toIso(row.created_at);
  return view;
};

export const toPrivateUser = (row: UserRow) => ({
  id: row.id,
  displayName: row.display_name,
  email: row.email,
  firstName: row.first_name,
  lastName: row.last_name,
  bio: row.bio,
  location: row.location,
  profileImageUrl: row.profile_image_url,
  isActive: toBool(row.is_active),
  isAdmin: toBool(row.is_admin),
  emailVerified: toBool(row.email_verified),
  emailVerifiedAt: toIsoOrNull(row.email_verified_at),
  emailPrivate: toBool(row.email_private),
  firstNamePrivate: toBool(row.first_name_private),
  lastNamePrivate: toBool(row.last_name_private),
  bioPrivate: toBool(row.bio_private),
  locationPrivate: toBool(row.location_private),
  createdAtPrivate: toBool(row.created_at_private),
  messagesEnabled: toBool(row.messages_enabled),
  notifyForumReply: toBool(row.notify_forum_reply),
  notifyForumMention: toBool(row.notify_forum_mention),
  notifyForumQuote: toBool(row.notify_forum_quote),
  emailNotificationsEvents: toBool(row.email_notifications_events),
  emailNotificationsMessages: toBool(row.email_notifications_messages),
  emailNotificationsNewsletter: toBool(row.email_notifications_newsletter),
  createdAt: toIso(row.created_at),
  updatedAt: toIso(row.updated_at)
});

export const findUserById = async (db: DbClient, id: string) =>
  db<UserRow>("users").where({ id }).first();

export const findActiveUser = async (db: DbClient, id: string) => {
  const user = await findUserById(db, id);
  return user && toBool(user.is_active) ? user : undefined;
};

/** Public views keyed by id, for embedding authors and creators in listings. */
export const loadPublicUsers = async (db: DbClient, ids: Iterable<string>) => {
  const unique = [...new Set(ids)];
  const users = new Map<string, PublicUser>();
  if (!unique.length) {
    return users;
  }
  const rows = await db<UserRow>("users").whereIn("id", unique);
  for (const row of rows) {
    users.set(row.id, toPublicUser(row));
  }
  return users;
};

export const isAdmin = (user: Pick<UserRow, "is_admin">) => toBool(user.is_admin);

/** Case-insensitive substring match that works on both pg and sqlite. */
export const likePattern = (term: string) => `%${term.toLowerCase().replace(/[\\%_]/g, "\\$&")}%`;

export const likeClause = (column: string) => `lower(${column}) like ? escape '\\'`;
