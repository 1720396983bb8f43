import { DbClient, toIso, toIsoOrNull } from "@community/db";
import { EventRow } from "./rows.js";

const HOUR = 60 * 60 * 1000;

export const POLITICAL_CATEGORY_MARKER = "politik";

export type EngagementLevel = "new" | "low" | "moderate" | "high" | "very_high";

export const engagementLevel = (attended: number): EngagementLevel => {
  if (attended === 0) return "new";
  if (attended < 3) return "low";
  if (attended < 10) return "moderate";
  if (attended < 25) return "high";
  return "very_high";
};

export const attendanceStats = (counts: { registered: number; attended: number; cancelled: number }) => {
  const decided = counts.attended + counts.cancelled;
  return {
    upcoming: counts.registered,
    attended: counts.attended,
    cancelled: counts.cancelled,
    totalEvents: counts.registered + counts.attended + counts.cancelled,
    attendanceRate: decided ? Math.round((counts.attended / decided) * 1000) / 10 : 0,
    engagementLevel: engagementLevel(counts.attended)
  };
};

export const capacityInfo = (maxParticipants: number | null, registered: number) => ({
  maxParticipants,
  registered,
  availableSpots: maxParticipants === null ? null : Math.max(0, maxParticipants - registered),
  utilizationPercent:
    maxParticipants === null || maxParticipants === 0
      ? null
      : Math.round((registered / maxParticipants) * 1000) / 10,
  isFull: maxParticipants !== null && registered >= maxParticipants
});

export const registrationClosesAt = (event: Pick<EventRow, "start_datetime">, deadlineHours: number) =>
  Date.parse(toIso(event.start_datetime)) - deadlineHours * HOUR;

/** An event with an end time completes once the configured delay after it has passed. */
export const isEligibleForCompletion = (
  event: Pick<EventRow, "end_datetime">,
  delayHours: number,
  now = Date.now()
) => {
  const end = toIsoOrNull(event.end_datetime);
  if (!end) {
    return false;
  }
  return now >= Date.parse(end) + delayHours * HOUR;
};

export const completeEvent = async (db: DbClient, eventId: string) =>
  db("event_participations")
    .where({ event_id: eventId, status: "registered" })
    .update({ status: "attended", updated_at: new Date().toISOString() });

export const communityScore = (input: { attended: number; organized: number; services: number }) =>
  Math.min(100, input.attended * 5 + input.organized * 10 + input.services * 8);
