import { FastifyReply, FastifyRequest } from "fastify";
import { extractBearerToken, verifyAccessToken } from "@community/shared";
import { config } from "./config.js";
import { getDb } from "./db.js";
import { sendError } from "./http.js";
import { UserRow } from "./rows.js";
import { findActiveUser, isAdmin } from "./users.js";

const resolveUser = async (request: FastifyRequest): Promise<UserRow | null> => {
  const token = extractBearerToken(request.headers.authorization);
  if (!token) {
    return null;
  }
  let userId: string;
  try {
    userId = await verifyAccessToken(token, { secret: config.JWT_SECRET, issuer: config.APP_NAME });
  } catch {
    return null;
  }
  const user = await findActiveUser(await getDb(), userId);
  return user ?? null;
};

/** Sends 401 and resolves to null when the caller is not an active, signed-in user. */
export const requireUser = async (request: FastifyRequest, reply: FastifyReply) => {
  const user = await resolveUser(request);
  if (!user) {
    await sendError(reply, "unauthorized", "Could not validate credentials");
    return null;
  }
  return user;
};

export const requireAdmin = async (request: FastifyRequest, reply: FastifyReply) => {
  const user = await requireUser(request, reply);
  if (!user) {
    return null;
  }
  if (!isAdmin(user)) {
    await sendError(reply, "forbidden", "Admin access required");
    return null;
  }
  return user;
};

export const optionalUser = (request: FastifyRequest) => resolveUser(request);
