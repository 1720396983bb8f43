import { readFileSync } from "node:fs";
import { randomUUID } from "node:crypto";
import { FastifyReply } from "fastify";
import { z } from "zod";
import { DbClient, asStringArray, parseJsonColumn } from "@community/db";
import { config } from "./config.js";
import { sendError } from "./http.js";
import { log } from "./log.js";
import { metrics } from "./metrics.js";
import { CommentRow, ForumPostRow } from "./rows.js";

export type ModerationResult = {
  isFlagged: boolean;
  confidence: number;
  reasons: string[];
  requiresReview: boolean;
};

export type ModeratedContentType = "event" | "service" | "thread" | "post" | "comment";

const bannedWords = new Set(
  z
    .array(z.string())
    .parse(JSON.parse(readFileSync(new URL("../data/banned-words.json", import.meta.url), "utf8")))
    .map((word) => word.toLowerCase())
);

const URL_PATTERN = /\b(?:https?:\/\/|www\.)\S+/;
const PHONE_PATTERN = /\b\d{10,}\b/;
const CAPS_PATTERN = /[A-Z]{5,}/;
const REPEATED_CHAR_PATTERN = /(.)\1{4,}/;
const REVIEW_THRESHOLD = 0.3;

const roundScore = (value: number) => Math.round(value * 100) / 100;

export const checkContent = (text: string, threshold = 0.7): ModerationResult => {
  if (!text) {
    return { isFlagged: false, confidence: 0, reasons: [], requiresReview: false };
  }
  const reasons: string[] = [];
  let score = 0;

  const tokens = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
  const banned = new Set(tokens.filter((token) => bannedWords.has(token)));
  if (banned.size) {
    reasons.push("Contains inappropriate language");
    score += 0.8 * banned.size;
  }
  if (URL_PATTERN.test(text)) {
    reasons.push("Contains URL");
    score += 0.3;
  }
  if (PHONE_PATTERN.test(text)) {
    reasons.push("Contains phone number");
    score += 0.5;
  }
  if (CAPS_PATTERN.test(text)) {
    reasons.push("Excessive caps");
    score += 0.2;
  }
  if (REPEATED_CHAR_PATTERN.test(text)) {
    reasons.push("Suspicious pattern detected");
    score += 0.3;
  }
  if (text.length > 2000) {
    reasons.push("Very long content");
    score += 0.1;
  }

  const words = text.toLowerCase().split(/\s+/).filter(Boolean);
  if (words.length > 10) {
    const counts = new Map<string, number>();
    for (const word of words) {
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
    if (Math.max(...counts.values()) > words.length * 0.3) {
      reasons.push("Repetitive content");
      score += 0.4;
    }
  }

  const confidence = Math.min(1, roundScore(score));
  return {
    isFlagged: confidence > threshold,
    confidence,
    reasons,
    requiresReview: confidence > REVIEW_THRESHOLD
  };
};

/** Null when moderation is switched off. */
export const assessContent = (...parts: Array<string | null | undefined>) => {
  if (!config.CONTENT_MODERATION_ENABLED) {
    return null;
  }
  const text = parts.filter((part): part is string => Boolean(part)).join("\n");
  return checkContent(text, config.MODERATION_THRESHOLD);
};

/** Sends 400 content_rejected and resolves to true when the text scored above the threshold. */
export const rejectFlagged = async (
  reply: FastifyReply,
  contentType: ModeratedContentType,
  result: ModerationResult | null
) => {
  if (!result?.isFlagged) {
    return false;
  }
  metrics.incCounter("content_action_total", { type: contentType, decision: "rejected" });
  log.warn("content.rejected", { contentType, confidence: result.confidence, reasons: result.reasons });
  await sendError(
    reply,
    "content_rejected",
    "Content violates community guidelines",
    result.reasons.join(", ")
  );
  return true;
};

export const recordModerationFlag = async (
  db: DbClient,
  input: {
    contentType: ModeratedContentType;
    contentId: string;
    userId: string;
    result: ModerationResult | null;
  }
) => {
  if (!input.result?.requiresReview) {
    return;
  }
  await db("moderation_flags").insert({
    id: randomUUID(),
    content_type: input.contentType,
    content_id: input.contentId,
    user_id: input.userId,
    confidence: input.result.confidence,
    reasons: JSON.stringify(input.result.reasons),
    status: "pending",
    created_at: new Date().toISOString()
  });
};

export const flagReasons = (value: unknown) => asStringArray(parseJsonColumn(value));

export const reviewUserContent = async (db: DbClient, userId: string) => {
  const comments = await db<CommentRow>("comments")
    .where({ author_id: userId })
    .orderBy("created_at", "desc")
    .limit(50);
  const posts = await db<ForumPostRow>("forum_posts")
    .where({ author_id: userId })
    .orderBy("created_at", "desc")
    .limit(20);

  const items = [
    ...comments.map((row) => ({ contentType: "comment", contentId: row.id, content: row.content })),
    ...posts.map((row) => ({ contentType: "post", contentId: row.id, content: row.content }))
  ];
  let flaggedCount = 0;
  let reviewCount = 0;
  let total = 0;
  const flaggedItems: Array<{ contentType: string; contentId: string; confidence: number; reasons: string[] }> =
    [];
  for (const item of items) {
    const result = checkContent(item.content, config.MODERATION_THRESHOLD);
    total += result.confidence;
    if (result.isFlagged) flaggedCount += 1;
    if (result.requiresReview) {
      reviewCount += 1;
      flaggedItems.push({
        contentType: item.contentType,
        contentId: item.contentId,
        confidence: result.confidence,
        reasons: result.reasons
      });
    }
  }
  const averageConfidence = items.length ? roundScore(total / items.length) : 0;
  return {
    userId,
    totalChecked: items.length,
    flaggedCount,
    reviewCount,
    averageConfidence,
    needsAdminReview: flaggedCount > 3 || averageConfidence > 0.5,
    items: flaggedItems
  };
};
