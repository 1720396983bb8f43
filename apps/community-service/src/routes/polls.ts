import { FastifyInstance } from "fastify";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { DbClient, toBool, toIso, toIsoOrNull } from "@community/db";
import { getDb } from "../db.js";
import { log } from "../log.js";
import { metrics } from "../metrics.js";
import { optionalUser, requireUser } from "../auth.js";
import { enforceContentLimit } from "../contentLimits.js";
import { badRequest, forbidden, idParamsSchema, notFound, nowIso, paginationSchema, queryFlag } from "../http.js";
import { analyzePoll, pollEngagementLevel, suggestedDurationHours, summarizeResults } from "../pollResults.js";
import { countBy, countRows } from "../queries.js";
import { ForumThreadRow, PollOptionRow, PollRow, PollVoteRow } from "../rows.js";
import { isAdmin } from "../users.js";

const HOUR = 60 * 60 * 1000;

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value).toISOString());

const optionsSchema = z.array(z.string().trim().min(1).max(200)).min(2).max(10);

const createSchema = z.object({
  question: z.string().trim().min(1).max(500),
  pollType: z.enum(["thread", "admin"]).default("thread"),
  threadId: z.string().min(1).optional(),
  options: optionsSchema,
  endsAt: isoDate.nullable().optional(),
  autoSuggestDuration: z.boolean().optional(),
  expectedParticipants: z.number().int().min(0).optional()
});

const updateSchema = z.object({
  question: z.string().trim().min(1).max(500).optional(),
  endsAt: isoDate.nullable().optional(),
  isActive: z.boolean().optional(),
  options: optionsSchema.optional()
});

const listQuerySchema = paginationSchema.extend({
  pollType: z.enum(["thread", "admin"]).optional(),
  threadId: z.string().min(1).optional(),
  activeOnly: queryFlag.default("true")
});

const resultsQuerySchema = z.object({ detailed: queryFlag.default("true") });
const voteSchema = z.object({ optionId: z.string().min(1) });

const hasEnded = (poll: Pick<PollRow, "ends_at">, now = Date.now()) => {
  const endsAt = toIsoOrNull(poll.ends_at);
  return endsAt !== null && Date.parse(endsAt) <= now;
};

const describePolls = async (db: DbClient, polls: PollRow[], viewerId: string | null) => {
  if (!polls.length) {
    return [];
  }
  const ids = polls.map((poll) => poll.id);
  const options = await db<PollOptionRow>("poll_options").whereIn("poll_id", ids).orderBy("order_index", "asc");
  const votesByOption = await countBy(db("poll_votes").whereIn("poll_id", ids), "option_id");
  const viewerVotes = new Map<string, string>();
  if (viewerId) {
    const votes = await db<PollVoteRow>("poll_votes").whereIn("poll_id", ids).where({ user_id: viewerId });
    for (const vote of votes) {
      viewerVotes.set(vote.poll_id, vote.option_id);
    }
  }
  return polls.map((poll) => {
    const own = options
      .filter((option) => option.poll_id === poll.id)
      .map((option) => ({
        id: option.id,
        text: option.text,
        orderIndex: Number(option.order_index),
        voteCount: votesByOption.get(option.id) ?? 0
      }));
    return {
      id: poll.id,
      question: poll.question,
      pollType: poll.poll_type,
      threadId: poll.thread_id,
      creatorId: poll.creator_id,
      isActive: toBool(poll.is_active),
      endsAt: toIsoOrNull(poll.ends_at),
      createdAt: toIso(poll.created_at),
      totalVotes: own.reduce((sum, option) => sum + option.voteCount, 0),
      options: own,
      userVote: viewerVotes.get(poll.id) ?? null,
      hasEnded: hasEnded(poll)
    };
  });
};

const describePoll = async (db: DbClient, poll: PollRow, viewerId: string | null) => {
  const [view] = await describePolls(db, [poll], viewerId);
  return view;
};

const insertOptions = async (db: DbClient, pollId: string, texts: string[]) => {
  await db("poll_options").insert(
    texts.map((text, index) => ({ id: randomUUID(), poll_id: pollId, text, order_index: index }))
  );
};

const findPoll = (db: DbClient, id: string) => db<PollRow>("polls").where({ id }).first();

export const registerPollRoutes = (app: FastifyInstance) => {
  app.post("/v1/polls", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = createSchema.parse(request.body ?? {});
    const admin = isAdmin(user);
    const db = await getDb();
    if (body.pollType === "admin") {
      if (!admin) {
        return forbidden(reply, "Only admins can create admin polls");
      }
      if (body.threadId) {
        return badRequest(reply, "Admin polls cannot be attached to a thread");
      }
    } else {
      if (!body.threadId) {
        return badRequest(reply, "Thread polls require a threadId");
      }
      const thread = await db<ForumThreadRow>("forum_threads").where({ id: body.threadId }).first();
      if (!thread) {
        return notFound(reply, "Thread not found");
      }
      if (toBool(thread.is_locked) && !admin) {
        return badRequest(reply, "Thread is locked");
      }
    }
    if (!(await enforceContentLimit(reply, user, "poll_create"))) return;

    let endsAt = body.endsAt ?? null;
    if (body.autoSuggestDuration) {
      const hours = suggestedDurationHours(body.pollType, body.expectedParticipants);
      endsAt = new Date(Date.now() + hours * HOUR).toISOString();
    } else if (endsAt && Date.parse(endsAt) <= Date.now()) {
      return badRequest(reply, "End time must be in the future");
    }

    const id = randomUUID();
    const poll: PollRow = {
      id,
      question: body.question,
      poll_type: body.pollType,
      thread_id: body.pollType === "thread" ? (body.threadId ?? null) : null,
      creator_id: user.id,
      is_active: true,
      ends_at: endsAt,
      created_at: nowIso()
    };
    await db.transaction(async (trx) => {
      await trx("polls").insert(poll);
      await insertOptions(trx, id, body.options);
    });
    metrics.incCounter("content_action_total", { type: "poll", decision: "created" });
    log.info("poll.created", { pollId: id, userId: user.id, pollType: body.pollType });
    return reply.code(201).send(await describePoll(db, poll, user.id));
  });

  app.get("/v1/polls", async (request, reply) => {
    const query = listQuerySchema.parse(request.query ?? {});
    const db = await getDb();
    const builder = db<PollRow>("polls");
    if (query.pollType) builder.where({ poll_type: query.pollType });
    if (query.threadId) builder.where({ thread_id: query.threadId });
    if (query.activeOnly) builder.where({ is_active: true });
    const rows = await builder.orderBy("created_at", "desc").offset(query.skip).limit(query.limit);
    const viewer = await optionalUser(request);
    return reply.send(await describePolls(db, rows, viewer?.id ?? null));
  });

  app.get("/v1/polls/my/created", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const db = await getDb();
    const rows = await db<PollRow>("polls").where({ creator_id: user.id }).orderBy("created_at", "desc");
    return reply.send(await describePolls(db, rows, user.id));
  });

  app.get("/v1/polls/my/votes", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const db = await getDb();
    const votes = await db<PollVoteRow>("poll_votes").where({ user_id: user.id }).orderBy("created_at", "desc");
    if (!votes.length) {
      return reply.send([]);
    }
    const rows = await db<PollRow>("polls").whereIn(
      "id",
      votes.map((vote) => vote.poll_id)
    );
    return reply.send(await describePolls(db, rows, user.id));
  });

  app.get("/v1/polls/my/stats", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const db = await getDb();
    const pollsCreated = await countRows(db("polls").where({ creator_id: user.id }));
    const votesCast = await countRows(db("poll_votes").where({ user_id: user.id }));
    return reply.send({
      pollsCreated,
      votesCast,
      engagementLevel: pollEngagementLevel(pollsCreated, votesCast)
    });
  });

  app.get("/v1/polls/:id", async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const poll = await findPoll(db, id);
    if (!poll) {
      return notFound(reply, "Poll not found");
    }
    const viewer = await optionalUser(request);
    return reply.send(await describePoll(db, poll, viewer?.id ?? null));
  });

  app.get("/v1/polls/:id/results", async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const { detailed } = resultsQuerySchema.parse(request.query ?? {});
    const db = await getDb();
    const poll = await findPoll(db, id);
    if (!poll) {
      return notFound(reply, "Poll not found");
    }
    const view = await describePoll(db, poll, null);
    const analysis = analyzePoll({
      pollId: poll.id,
      question: poll.question,
      isActive: toBool(poll.is_active),
      endsAt: toIsoOrNull(poll.ends_at),
      options: (view?.options ?? []).map((option) => ({
        optionId: option.id,
        text: option.text,
        orderIndex: option.orderIndex,
        votes: option.voteCount
      }))
    });
    return reply.send(detailed ? analysis : summarizeResults(analysis));
  });

  app.put("/v1/polls/:id", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const body = updateSchema.parse(request.body ?? {});
    const db = await getDb();
    const poll = await findPoll(db, id);
    if (!poll) {
      return notFound(reply, "Poll not found");
    }
    if (poll.creator_id !== user.id && !isAdmin(user)) {
      return forbidden(reply);
    }
    if (body.options && (await countRows(db("poll_votes").where({ poll_id: id }))) > 0) {
      return badRequest(reply, "Cannot modify options after votes have been cast");
    }
    const changes: Partial<PollRow> = {};
    if (body.question !== undefined) changes.question = body.question;
    if (body.endsAt !== undefined) changes.ends_at = body.endsAt;
    if (body.isActive !== undefined) changes.is_active = body.isActive;
    await db.transaction(async (trx) => {
      if (Object.keys(changes).length) {
        await trx("polls").where({ id }).update(changes);
      }
      if (body.options) {
        await trx("poll_options").where({ poll_id: id }).del();
        await insertOptions(trx, id, body.options);
      }
    });
    return reply.send(await describePoll(db, { ...poll, ...changes }, user.id));
  });

  app.delete("/v1/polls/:id", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const poll = await findPoll(db, id);
    if (!poll) {
      return notFound(reply, "Poll not found");
    }
    if (poll.creator_id !== user.id && !isAdmin(user)) {
      return forbidden(reply);
    }
    await db("polls").where({ id }).del();
    return reply.send({ message: "Poll deleted" });
  });

  app.post("/v1/polls/:id/vote", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const body = voteSchema.parse(request.body ?? {});
    const db = await getDb();
    const poll = await db<PollRow>("polls").where({ id, is_active: true }).first();
    if (!poll) {
      return notFound(reply, "Poll not found or inactive");
    }
    if (hasEnded(poll)) {
      return badRequest(reply, "Poll has ended");
    }
    const option = await db<PollOptionRow>("poll_options").where({ id: body.optionId, poll_id: id }).first();
    if (!option) {
      return badRequest(reply, "Invalid option for this poll");
    }
    if (!(await enforceContentLimit(reply, user, "poll_vote"))) return;

    const now = nowIso();
    // A second vote by the same user moves the existing one.
    await db("poll_votes")
      .insert({ id: randomUUID(), poll_id: id, option_id: option.id, user_id: user.id, created_at: now })
      .onConflict(["poll_id", "user_id"])
      .merge({ option_id: option.id, created_at: now });
    const stored = await db<PollVoteRow>("poll_votes").where({ poll_id: id, user_id: user.id }).first();
    if (!stored) {
      throw new Error("poll_vote_upsert_failed");
    }
    const voteId = stored.id;
    metrics.incCounter("content_action_total", { type: "vote", decision: "created" });
    return reply.code(201).send({ id: voteId, pollId: id, optionId: option.id, userId: user.id, createdAt: now });
  });

  app.delete("/v1/polls/:id/vote", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const removed = await db("poll_votes").where({ poll_id: id, user_id: user.id }).del();
    if (!removed) {
      return badRequest(reply, "No vote to remove");
    }
    return reply.send({ message: "Vote removed" });
  });
};
