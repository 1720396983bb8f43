import { randomUUID } from "node:crypto";
import { DbClient } from "@community/db";
import { config } from "./config.js";

export type MailTemplate = "email_verification" | "password_reset" | "event_update" | "event_cancelled";

export type OutgoingMail = {
  to: string;
  subject: string;
  body: string;
  template: MailTemplate;
};

export const enqueueMail = async (db: DbClient, mail: OutgoingMail) => {
  const now = new Date().toISOString();
  const id = randomUUID();
  await db("mail_outbox").insert({
    id,
    recipient: mail.to,
    subject: mail.subject,
    body: mail.body,
    template: mail.template,
    status: "pending",
    attempts: 0,
    next_attempt_at: now,
    created_at: now,
    updated_at: now
  });
  return id;
};

const link = (path: string, token: string) =>
  `${config.PUBLIC_BASE_URL.replace(/\/$/, "")}${path}?token=${encodeURIComponent(token)}`;

export const verificationMail = (input: { to: string; displayName: string; token: string }): OutgoingMail => ({
  to: input.to,
  subject: `${config.APP_NAME}: confirm your email address`,
  template: "email_verification",
  body: [
    `Hi ${input.displayName},`,
    "",
    "please confirm your email address by opening this link:",
    link("/verify-email", input.token),
    "",
    `The link is valid for ${config.EMAIL_VERIFICATION_TTL_HOURS} hours.`
  ].join("\n")
});

export const passwordResetMail = (input: { to: string; displayName: string; token: string }): OutgoingMail => ({
  to: input.to,
  subject: `${config.APP_NAME}: reset your password`,
  template: "password_reset",
  body: [
    `Hi ${input.displayName},`,
    "",
    "someone asked to reset the password for your account. If that was you, open:",
    link("/reset-password", input.token),
    "",
    `The link is valid for ${config.PASSWORD_RESET_TTL_MINUTES} minutes. Otherwise ignore this email.`
  ].join("\n")
});

export const eventChangeMail = (input: {
  to: string;
  displayName: string;
  eventTitle: string;
  cancelled: boolean;
  summary: string;
}): OutgoingMail => ({
  to: input.to,
  subject: input.cancelled
    ? `${config.APP_NAME}: "${input.eventTitle}" was cancelled`
    : `${config.APP_NAME}: "${input.eventTitle}" has changed`,
  template: input.cancelled ? "event_cancelled" : "event_update",
  body: [`Hi ${input.displayName},`, "", input.summary].join("\n")
});
