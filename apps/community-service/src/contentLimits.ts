import { readFileSync } from "node:fs";
import { FastifyReply } from "fastify";
import { z } from "zod";
import { toIso } from "@community/db";
import { config } from "./config.js";
import { sendError } from "./http.js";
import { log } from "./log.js";
import { metrics } from "./metrics.js";
import { UserRow } from "./rows.js";
import { isAdmin } from "./users.js";

export const CONTENT_TYPES = [
  "forum_post",
  "forum_reply",
  "event_create",
  "service_create",
  "comment",
  "poll_create",
  "poll_vote"
] as const;
export type ContentType = (typeof CONTENT_TYPES)[number];

export const USER_TIERS = ["new", "regular", "established", "trusted"] as const;
export type UserTier = (typeof USER_TIERS)[number];

const rateLimitSchema = z.object({
  hourly: z.number().int().positive(),
  daily: z.number().int().positive(),
  weekly: z.number().int().positive().optional(),
  burst: z.number().int().positive().optional()
});
export type RateLimit = z.infer<typeof rateLimitSchema>;

const tierTableSchema = z.record(z.enum(USER_TIERS), rateLimitSchema);
const limitTableSchema = z.record(z.enum(CONTENT_TYPES), tierTableSchema);
export type LimitTable = z.infer<typeof limitTableSchema>;

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const WEEK = 7 * DAY;
const BURST_WINDOW = 5 * MINUTE;

export type RateLimitDecision =
  | {
      allowed: true;
      tier: UserTier;
      remaining: { hourly: number; daily: number; weekly: number | null; burst: number | null };
    }
  | {
      allowed: false;
      reason: "locked_out" | "burst_limit_exceeded" | "hourly_limit_exceeded" | "daily_limit_exceeded" | "weekly_limit_exceeded";
      window: string;
      limit: number | null;
      retryAfterSeconds: number;
    };

const DAYS_AS_NEW = 7;
const DAYS_AS_REGULAR = 30;

export const userTier = (user: Pick<UserRow, "is_admin" | "created_at">, now = Date.now()): UserTier => {
  if (isAdmin(user)) {
    return "trusted";
  }
  const ageMs = now - Date.parse(toIso(user.created_at));
  if (ageMs < DAYS_AS_NEW * DAY) return "new";
  if (ageMs < DAYS_AS_REGULAR * DAY) return "regular";
  return "established";
};

const countSince = (timestamps: number[], since: number) =>
  timestamps.filter((value) => value > since).length;

/** Seconds until the oldest attempt inside the window slides out of it. */
const secondsUntilFree = (timestamps: number[], windowMs: number, now: number) => {
  const inWindow = timestamps.filter((value) => value > now - windowMs);
  const oldest = Math.min(...inWindow);
  return Math.max(1, Math.ceil((oldest + windowMs - now) / 1000));
};

export class ContentRateLimiter {
  private readonly attempts = new Map<string, Map<ContentType, number[]>>();
  private readonly lockouts = new Map<string, number>();

  constructor(
    private readonly limits: LimitTable,
    private readonly clock: () => number = Date.now
  ) {}

  limitFor(type: ContentType, tier: UserTier): RateLimit | undefined {
    const table = this.limits[type];
    return table?.[tier] ?? table?.regular;
  }

  check(userId: string, type: ContentType, tier: UserTier): RateLimitDecision {
    const now = this.clock();
    const lockKey = `${userId}:${type}`;
    const lockedUntil = this.lockouts.get(lockKey);
    if (lockedUntil !== undefined) {
      if (now < lockedUntil) {
        return {
          allowed: false,
          reason: "locked_out",
          window: "lockout",
          limit: null,
          retryAfterSeconds: Math.ceil((lockedUntil - now) / 1000)
        };
      }
      this.lockouts.delete(lockKey);
    }

    const limit = this.limitFor(type, tier);
    if (!limit) {
      return { allowed: true, tier, remaining: { hourly: 0, daily: 0, weekly: null, burst: null } };
    }

    const perType = this.attempts.get(userId) ?? new Map<ContentType, number[]>();
    this.attempts.set(userId, perType);
    const timestamps = (perType.get(type) ?? []).filter((value) => value > now - WEEK);
    perType.set(type, timestamps);

    const burst = countSince(timestamps, now - BURST_WINDOW);
    const hourly = countSince(timestamps, now - HOUR);
    const daily = countSince(timestamps, now - DAY);
    const weekly = timestamps.length;

    if (limit.burst !== undefined && burst >= limit.burst) {
      this.lockouts.set(lockKey, now + BURST_WINDOW);
      return {
        allowed: false,
        reason: "burst_limit_exceeded",
        window: "5 minutes",
        limit: limit.burst,
        retryAfterSeconds: BURST_WINDOW / 1000
      };
    }
    if (hourly >= limit.hourly) {
      return {
        allowed: false,
        reason: "hourly_limit_exceeded",
        window: "1 hour",
        limit: limit.hourly,
        retryAfterSeconds: secondsUntilFree(timestamps, HOUR, now)
      };
    }
    if (daily >= limit.daily) {
      return {
        allowed: false,
        reason: "daily_limit_exceeded",
        window: "24 hours",
        limit: limit.daily,
        retryAfterSeconds: secondsUntilFree(timestamps, DAY, now)
      };
    }
    if (limit.weekly !== undefined && weekly >= limit.weekly) {
      return {
        allowed: false,
        reason: "weekly_limit_exceeded",
        window: "7 days",
        limit: limit.weekly,
        retryAfterSeconds: secondsUntilFree(timestamps, WEEK, now)
      };
    }

    timestamps.push(now);
    return {
      allowed: true,
      tier,
      remaining: {
        hourly: limit.hourly - hourly - 1,
        daily: limit.daily - daily - 1,
        weekly: limit.weekly === undefined ? null : limit.weekly - weekly - 1,
        burst: limit.burst === undefined ? null : limit.burst - burst - 1
      }
    };
  }

  usage(userId: string) {
    const now = this.clock();
    const usage: Partial<Record<ContentType, { hourlyUsage: number; dailyUsage: number }>> = {};
    for (const [type, timestamps] of this.attempts.get(userId) ?? []) {
      usage[type] = {
        hourlyUsage: countSince(timestamps, now - HOUR),
        dailyUsage: countSince(timestamps, now - DAY)
      };
    }
    const lockouts: Record<string, { lockedUntil: string; secondsRemaining: number }> = {};
    for (const [key, until] of this.lockouts) {
      const [owner, type] = key.split(":");
      if (owner === userId && type && now < until) {
        lockouts[type] = {
          lockedUntil: new Date(until).toISOString(),
          secondsRemaining: Math.ceil((until - now) / 1000)
        };
      }
    }
    return { usage, lockouts };
  }

  clear(userId: string) {
    const hadAttempts = this.attempts.delete(userId);
    let clearedLockouts = 0;
    for (const key of [...this.lockouts.keys()]) {
      if (key.startsWith(`${userId}:`)) {
        this.lockouts.delete(key);
        clearedLockouts += 1;
      }
    }
    return { clearedAttempts: hadAttempts, clearedLockouts };
  }

  overview() {
    const now = this.clock();
    let activeUsers = 0;
    for (const perType of this.attempts.values()) {
      if ([...perType.values()].some((timestamps) => countSince(timestamps, now - DAY) > 0)) {
        activeUsers += 1;
      }
    }
    const activeLockouts = [...this.lockouts.values()].filter((until) => now < until).length;
    return {
      activeUsers,
      activeLockouts,
      trackedUsers: this.attempts.size,
      contentTypes: [...CONTENT_TYPES],
      userTiers: [...USER_TIERS]
    };
  }
}

export const loadLimitTable = (): LimitTable =>
  limitTableSchema.parse(
    JSON.parse(readFileSync(new URL("../data/content-rate-limits.json", import.meta.url), "utf8"))
  );

export const contentLimiter = new ContentRateLimiter(loadLimitTable());

const METRIC_TYPE: Record<ContentType, string> = {
  forum_post: "thread",
  forum_reply: "post",
  event_create: "event",
  service_create: "service",
  comment: "comment",
  poll_create: "poll",
  poll_vote: "vote"
};

/** Sends 429 and resolves to false when the user is over a limit for this content type. */
export const enforceContentLimit = async (reply: FastifyReply, user: UserRow, type: ContentType) => {
  if (!config.CONTENT_RATE_LIMITS_ENABLED) {
    return true;
  }
  const decision = contentLimiter.check(user.id, type, userTier(user));
  if (decision.allowed) {
    return true;
  }
  metrics.incCounter("content_action_total", { type: METRIC_TYPE[type], decision: "rate_limited" });
  log.warn("content.rate_limited", { userId: user.id, type, reason: decision.reason });
  reply.header("retry-after", String(decision.retryAfterSeconds));
  await sendError(
    reply,
    "rate_limited",
    "Too many submissions, please slow down",
    `${decision.reason} (${decision.window})`
  );
  return false;
};
