// Row shapes as the drivers return them: booleans may be 0/1 and timestamps Date or text.

type Flag = boolean | number;
type Timestamp = string | Date;

export type UserRow = {
  id: string;
  display_name: string;
  email: string;
  password_hash: string;
  first_name: string | null;
  last_name: string | null;
  bio: string | null;
  location: string | null;
  profile_image_url: string | null;
  is_active: Flag;
  is_admin: Flag;
  email_verified: Flag;
  email_verified_at: Timestamp | null;
  email_private: Flag;
  first_name_private: Flag;
  last_name_private: Flag;
  bio_private: Flag;
  location_private: Flag;
  created_at_private: Flag;
  messages_enabled: Flag;
  notify_forum_reply: Flag;
  notify_forum_mention: Flag;
  notify_forum_quote: Flag;
  email_notifications_events: Flag;
  email_notifications_messages: Flag;
  email_notifications_newsletter: Flag;
  created_at: Timestamp;
  updated_at: Timestamp;
};

export type OneTimeTokenRow = {
  id: string;
  user_id: string;
  token_hash: string;
  expires_at: Timestamp;
  used_at: Timestamp | null;
  created_at: Timestamp;
};

export type RefreshTokenRow = {
  id: string;
  user_id: string;
  token_hash: string;
  expires_at: Timestamp;
  revoked_at: Timestamp | null;
  created_at: Timestamp;
};

export type EventCategoryRow = {
  id: string;
  name: string;
  description: string | null;
  created_at: Timestamp;
};

export type EventRow = {
  id: string;
  title: string;
  description: string;
  start_datetime: Timestamp;
  end_datetime: Timestamp | null;
  location: string | null;
  max_participants: number | null;
  category_id: string | null;
  creator_id: string;
  is_active: Flag;
  created_at: Timestamp;
  updated_at: Timestamp;
};

export type ParticipationStatus = "registered" | "attended" | "cancelled";

export type ParticipationRow = {
  id: string;
  event_id: string;
  user_id: string;
  status: ParticipationStatus;
  registered_at: Timestamp;
  updated_at: Timestamp;
};

export type ServiceRow = {
  id: string;
  user_id: string;
  title: string;
  description: string;
  is_offering: Flag;
  meeting_locations: unknown;
  price_type: string;
  price_amount: number | string | null;
  price_currency: string;
  estimated_duration_hours: number | null;
  contact_method: string;
  response_time_hours: number | null;
  is_completed: Flag;
  completed_at: Timestamp | null;
  view_count: number;
  interest_count: number;
  service_type: string;
  slug: string;
  admin_notes: string | null;
  is_active: Flag;
  created_at: Timestamp;
  updated_at: Timestamp;
};

export type ForumCategoryRow = {
  id: string;
  name: string;
  description: string | null;
  color: string;
  icon: string | null;
  is_active: Flag;
  display_order: number;
  created_at: Timestamp;
  updated_at: Timestamp;
};

export type ForumThreadRow = {
  id: string;
  title: string;
  category_id: string;
  creator_id: string;
  is_pinned: Flag;
  is_locked: Flag;
  created_at: Timestamp;
  updated_at: Timestamp;
};

export type ForumPostRow = {
  id: string;
  thread_id: string;
  author_id: string;
  content: string;
  created_at: Timestamp;
  updated_at: Timestamp | null;
};

export type PollType = "thread" | "admin";

export type PollRow = {
  id: string;
  question: string;
  poll_type: PollType;
  thread_id: string | null;
  creator_id: string;
  is_active: Flag;
  ends_at: Timestamp | null;
  created_at: Timestamp;
};

export type PollOptionRow = {
  id: string;
  poll_id: string;
  text: string;
  order_index: number;
};

export type PollVoteRow = {
  id: string;
  poll_id: string;
  option_id: string;
  user_id: string;
  created_at: Timestamp;
};

export type CommentRow = {
  id: string;
  content: string;
  author_id: string;
  event_id: string | null;
  service_id: string | null;
  parent_id: string | null;
  is_active: Flag;
  created_at: Timestamp;
  updated_at: Timestamp | null;
};

export type NotificationRow = {
  id: string;
  user_id: string;
  type: string;
  title: string;
  message: string;
  data: unknown;
  is_read: Flag;
  created_at: Timestamp;
};

export type ModerationFlagRow = {
  id: string;
  content_type: string;
  content_id: string;
  user_id: string;
  confidence: number;
  reasons: unknown;
  status: "pending" | "dismissed" | "actioned";
  resolved_by: string | null;
  resolved_at: Timestamp | null;
  created_at: Timestamp;
};

export type MailOutboxRow = {
  id: string;
  recipient: string;
  subject: string;
  body: string;
  template: string;
  status: "pending" | "sent" | "dead";
  attempts: number;
  next_attempt_at: Timestamp;
  last_error: string | null;
  sent_at: Timestamp | null;
  created_at: Timestamp;
  updated_at: Timestamp;
};
