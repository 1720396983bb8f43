import fastify from "fastify";
import rateLimit from "@fastify/rate-limit";
import { randomUUID } from "node:crypto";
import { ZodError } from "zod";
import { makeErrorResponse } from "@community/shared";
import { config } from "./config.js";
import { log } from "./log.js";
import { metrics } from "./metrics.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerAuthRoutes } from "./routes/auth.js";
import { registerUserRoutes } from "./routes/users.js";
import { registerEventCategoryRoutes } from "./routes/eventCategories.js";
import { registerEventRoutes } from "./routes/events.js";
import { registerServiceRoutes } from "./routes/services.js";
import { registerForumRoutes } from "./routes/forum.js";
import { registerPollRoutes } from "./routes/polls.js";
import { registerCommentRoutes } from "./routes/comments.js";
import { registerNotificationRoutes } from "./routes/notifications.js";
import { registerAdminRoutes } from "./routes/admin.js";

const describeZodError = (error: ZodError) =>
  error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");

export const buildServer = () => {
  const app = fastify({
    logger: false,
    trustProxy: config.TRUST_PROXY,
    bodyLimit: config.BODY_LIMIT_BYTES
  });

  app.addHook("onRequest", async (request, reply) => {
    const incoming = request.headers["x-request-id"];
    const requestId = Array.isArray(incoming) ? incoming[0] : (incoming ?? randomUUID());
    request.requestId = requestId;
    reply.header("X-Request-Id", requestId);
  });

  app.addHook("onResponse", async (request, reply) => {
    const route = request.routeOptions?.url ?? request.url.split("?")[0];
    metrics.incCounter("requests_total", {
      route,
      method: request.method,
      status: String(reply.statusCode)
    });
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send(
        makeErrorResponse("invalid_request", "Invalid request", {
          details: describeZodError(error),
          devMode: config.DEV_MODE
        })
      );
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode === 429) {
      return reply
        .code(429)
        .send(makeErrorResponse("rate_limited", "Too many requests", { devMode: config.DEV_MODE }));
    }
    if (statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send(
        makeErrorResponse("invalid_request", error.message || "Invalid request", {
          devMode: config.DEV_MODE
        })
      );
    }
    log.error("request.failed", { requestId: request.requestId, error: error.message });
    return reply.code(500).send(
      makeErrorResponse("internal_error", "Internal error", {
        devMode: config.DEV_MODE,
        debug: config.DEV_MODE ? { cause: error.message } : undefined
      })
    );
  });

  app.register(rateLimit, { max: config.RATE_LIMIT_PER_MINUTE, timeWindow: "1 minute" });

  registerHealthRoutes(app);
  registerAuthRoutes(app);
  registerUserRoutes(app);
  registerEventCategoryRoutes(app);
  registerEventRoutes(app);
  registerServiceRoutes(app);
  registerForumRoutes(app);
  registerPollRoutes(app);
  registerCommentRoutes(app);
  registerNotificationRoutes(app);
  registerAdminRoutes(app);

  return app;
};
