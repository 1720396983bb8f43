import { FastifyReply } from "fastify";
import { z } from "zod";
import { ErrorCode, makeErrorResponse, statusForErrorCode } from "@community/shared";
import { config } from "./config.js";

declare module "fastify" {
  interface FastifyRequest {
    requestId?: string;
  }
}

export const sendError = (
  reply: FastifyReply,
  error: ErrorCode,
  message: string,
  details?: string
) =>
  reply
    .code(statusForErrorCode(error))
    .send(makeErrorResponse(error, message, { details, devMode: config.DEV_MODE }));

export const notFound = (reply: FastifyReply, message: string) =>
  sendError(reply, "not_found", message);

export const forbidden = (reply: FastifyReply, message = "Not enough permissions") =>
  sendError(reply, "forbidden", message);

export const badRequest = (reply: FastifyReply, message: string, details?: string) =>
  sendError(reply, "invalid_request", message, details);

export const queryFlag = z.enum(["true", "false"]).transform((value) => value === "true");

export const paginationSchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(50)
});

export const idParamsSchema = z.object({ id: z.string().min(1) });

export const nowIso = () => new Date().toISOString();

export const hoursFromNow = (hours: number) => new Date(Date.now() + hours * 60 * 60 * 1000).toISOString();
