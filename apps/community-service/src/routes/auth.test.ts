import { test, after } from "node:test";
import assert from "node:assert/strict";
import { bearer, createUser, startApp, stopApp, TEST_PASSWORD } from "../testSupport.js";

const app = await startApp();
const { getDb } = await import("../db.js");

after(async () => {
  await stopApp(app);
});

const latestMailFor = async (recipient: string) => {
  const db = await getDb();
  return db("mail_outbox").where({ recipient }).orderBy("created_at", "desc").first();
};

const tokenFromMail = (body: string) => {
  const match = /token=([\w-]+)/.exec(body);
  assert.ok(match?.[1], "mail carries a token link");
  return match[1];
};

test("register creates an unverified user and queues a verification email", async () => {
  const response = await app.inject({
    method: "POST",
    url: "/v1/auth/register",
    payload: { displayName: "Alice", email: "Alice@Example.test", password: TEST_PASSWORD }
  });
  assert.equal(response.statusCode, 201);
  const user = response.json();
  assert.equal(user.displayName, "Alice");
  assert.equal(user.email, "alice@example.test");
  assert.equal(user.emailVerified, false);
  assert.equal(user.emailPrivate, true);
  assert.equal("passwordHash" in user, false);

  const mail = await latestMailFor("alice@example.test");
  assert.equal(mail.template, "email_verification");
  assert.equal(mail.status, "pending");
  const token = tokenFromMail(mail.body);

  const verified = await app.inject({ method: "POST", url: "/v1/auth/verify-email", payload: { token } });
  assert.equal(verified.statusCode, 200);
  const db = await getDb();
  const row = await db("users").where({ id: user.id }).first();
  assert.equal(Boolean(row.email_verified), true);

  const again = await app.inject({ method: "POST", url: "/v1/auth/verify-email", payload: { token } });
  assert.equal(again.statusCode, 400);
  assert.equal(again.json().message, "Invalid or expired verification token");
});

test("register rejects duplicates and weak passwords", async () => {
  await createUser({ displayName: "Bruno" });
  const duplicateEmail = await app.inject({
    method: "POST",
    url: "/v1/auth/register",
    payload: { displayName: "Bruno2", email: "bruno@example.test", password: TEST_PASSWORD }
  });
  assert.equal(duplicateEmail.statusCode, 400);
  assert.deepEqual(duplicateEmail.json(), {
    error: "invalid_request",
    message: "Email already registered"
  });

  const duplicateName = await app.inject({
    method: "POST",
    url: "/v1/auth/register",
    payload: { displayName: "bruno", email: "other@example.test", password: TEST_PASSWORD }
  });
  assert.equal(duplicateName.statusCode, 400);
  assert.equal(duplicateName.json().message, "Display name already taken");

  const weak = await app.inject({
    method: "POST",
    url: "/v1/auth/register",
    payload: { displayName: "Carla", email: "carla@example.test", password: "password" }
  });
  assert.equal(weak.statusCode, 400);
  assert.equal(
    weak.json().details,
    "Password must contain at least one digit; Password must contain at least one uppercase letter; Password must contain at least one special character"
  );

  const invalid = await app.inject({
    method: "POST",
    url: "/v1/auth/register",
    payload: { displayName: "D", email: "not-an-email", password: TEST_PASSWORD }
  });
  assert.equal(invalid.statusCode, 400);
  assert.equal(invalid.json().error, "invalid_request");
});

test("login issues bearer tokens and rejects bad credentials", async () => {
  const user = await createUser({ displayName: "Dora" });
  const bad = await app.inject({
    method: "POST",
    url: "/v1/auth/login",
    payload: { email: user.email, password: "Wrong-pass1!" }
  });
  assert.equal(bad.statusCode, 401);
  assert.deepEqual(bad.json(), { error: "unauthorized", message: "Incorrect email or password" });

  const good = await app.inject({
    method: "POST",
    url: "/v1/auth/login",
    payload: { email: user.email, password: TEST_PASSWORD }
  });
  assert.equal(good.statusCode, 200);
  const tokens = good.json();
  assert.equal(tokens.tokenType, "bearer");
  assert.equal(tokens.expiresIn, 1800);

  const me = await app.inject({ method: "GET", url: "/v1/auth/me", headers: bearer(tokens.accessToken) });
  assert.equal(me.statusCode, 200);
  assert.equal(me.json().id, user.id);

  const status = await app.inject({ method: "GET", url: "/v1/auth/status", headers: bearer(tokens.accessToken) });
  assert.deepEqual(status.json(), { userId: user.id, emailVerified: true, isAdmin: false, isActive: true });
});

test("refresh rotates tokens and logout revokes them", async () => {
  const user = await createUser({ displayName: "Emil" });
  const login = await app.inject({
    method: "POST",
    url: "/v1/auth/login",
    payload: { email: user.email, password: TEST_PASSWORD }
  });
  const first = login.json().refreshToken;

  const rotated = await app.inject({ method: "POST", url: "/v1/auth/refresh", payload: { refreshToken: first } });
  assert.equal(rotated.statusCode, 200);
  const second = rotated.json().refreshToken;
  assert.notEqual(second, first);

  const reused = await app.inject({ method: "POST", url: "/v1/auth/refresh", payload: { refreshToken: first } });
  assert.equal(reused.statusCode, 401);
  assert.equal(reused.json().message, "Invalid refresh token");

  const logout = await app.inject({ method: "POST", url: "/v1/auth/logout", payload: { refreshToken: second } });
  assert.equal(logout.statusCode, 200);
  const afterLogout = await app.inject({
    method: "POST",
    url: "/v1/auth/refresh",
    payload: { refreshToken: second }
  });
  assert.equal(afterLogout.statusCode, 401);
});

test("concurrent refreshes of one token yield a single new pair", async () => {
  const user = await createUser({ displayName: "Racer" });
  const login = await app.inject({
    method: "POST",
    url: "/v1/auth/login",
    payload: { email: user.email, password: TEST_PASSWORD }
  });
  const refreshToken = login.json().refreshToken;
  const responses = await Promise.all(
    Array.from({ length: 4 }, () =>
      app.inject({ method: "POST", url: "/v1/auth/refresh", payload: { refreshToken } })
    )
  );
  assert.deepEqual(
    responses.map((response) => response.statusCode).sort(),
    [200, 401, 401, 401]
  );
});

test("concurrent registrations with the same email create one account", async () => {
  const payload = { displayName: "Twin", email: "twin@example.test", password: TEST_PASSWORD };
  const responses = await Promise.all([
    app.inject({ method: "POST", url: "/v1/auth/register", payload }),
    app.inject({ method: "POST", url: "/v1/auth/register", payload })
  ]);
  assert.deepEqual(responses.map((response) => response.statusCode).sort(), [201, 400]);
  const rejected = responses.find((response) => response.statusCode === 400);
  assert.equal(rejected?.json().message, "Email already registered");
  const db = await getDb();
  assert.equal((await db("users").where({ email: "twin@example.test" })).length, 1);
});

test("logout-all revokes every refresh token of the user", async () => {
  const user = await createUser({ displayName: "Fritz" });
  const response = await app.inject({ method: "POST", url: "/v1/auth/logout-all", headers: bearer(user.token) });
  assert.equal(response.statusCode, 200);
  assert.equal(response.json().revoked, 1);
});

test("password reset replaces the password and ends sessions", async () => {
  const user = await createUser({ displayName: "Greta" });
  const unknown = await app.inject({
    method: "POST",
    url: "/v1/auth/forgot-password",
    payload: { email: "nobody@example.test" }
  });
  assert.equal(unknown.statusCode, 200);
  assert.equal(await latestMailFor("nobody@example.test"), undefined);

  const known = await app.inject({ method: "POST", url: "/v1/auth/forgot-password", payload: { email: user.email } });
  assert.deepEqual(known.json(), unknown.json());
  const mail = await latestMailFor(user.email);
  assert.equal(mail.template, "password_reset");
  const token = tokenFromMail(mail.body);

  const weak = await app.inject({
    method: "POST",
    url: "/v1/auth/reset-password",
    payload: { token, newPassword: "short" }
  });
  assert.equal(weak.statusCode, 400);

  const reset = await app.inject({
    method: "POST",
    url: "/v1/auth/reset-password",
    payload: { token, newPassword: "Brand-new2?" }
  });
  assert.equal(reset.statusCode, 200);

  const db = await getDb();
  const live = await db("refresh_tokens").where({ user_id: user.id }).whereNull("revoked_at");
  assert.equal(live.length, 0);

  const login = await app.inject({
    method: "POST",
    url: "/v1/auth/login",
    payload: { email: user.email, password: "Brand-new2?" }
  });
  assert.equal(login.statusCode, 200);
});

test("changing email requires the password and resets verification", async () => {
  const user = await createUser({ displayName: "Hanna" });
  const wrong = await app.inject({
    method: "PUT",
    url: "/v1/auth/email",
    headers: bearer(user.token),
    payload: { newEmail: "hanna.new@example.test", password: "Wrong-pass1!" }
  });
  assert.equal(wrong.statusCode, 400);
  assert.equal(wrong.json().message, "Incorrect password");

  const changed = await app.inject({
    method: "PUT",
    url: "/v1/auth/email",
    headers: bearer(user.token),
    payload: { newEmail: "hanna.new@example.test", password: TEST_PASSWORD }
  });
  assert.equal(changed.statusCode, 200);
  assert.equal(changed.json().email, "hanna.new@example.test");
  assert.equal(changed.json().emailVerified, false);
  assert.equal((await latestMailFor("hanna.new@example.test")).template, "email_verification");
});

test("resend-verification refuses verified users", async () => {
  const verified = await createUser({ displayName: "Ida", emailVerified: true });
  const response = await app.inject({
    method: "POST",
    url: "/v1/auth/resend-verification",
    headers: bearer(verified.token)
  });
  assert.equal(response.statusCode, 409);

  const unverified = await createUser({ displayName: "Jonas", emailVerified: false });
  const sent = await app.inject({
    method: "POST",
    url: "/v1/auth/resend-verification",
    headers: bearer(unverified.token)
  });
  assert.equal(sent.statusCode, 200);
  assert.equal((await latestMailFor(unverified.email)).template, "email_verification");
});

test("deleting the account anonymises it and blocks access", async () => {
  const user = await createUser({ displayName: "Karl" });
  const response = await app.inject({
    method: "DELETE",
    url: "/v1/auth/account",
    headers: bearer(user.token),
    payload: { password: TEST_PASSWORD }
  });
  assert.equal(response.statusCode, 200);

  const db = await getDb();
  const row = await db("users").where({ id: user.id }).first();
  assert.equal(row.email, `deleted_${user.id}@deleted.local`);
  assert.equal(row.display_name, `deleted_user_${user.id.slice(0, 7)}`);
  assert.equal(Boolean(row.is_active), false);

  const me = await app.inject({ method: "GET", url: "/v1/auth/me", headers: bearer(user.token) });
  assert.equal(me.statusCode, 401);
  assert.equal(me.json().message, "Could not validate credentials");
});

test("protected routes reject missing or malformed tokens", async () => {
  const missing = await app.inject({ method: "GET", url: "/v1/auth/me" });
  assert.equal(missing.statusCode, 401);
  const malformed = await app.inject({ method: "GET", url: "/v1/auth/me", headers: bearer("not-a-jwt") });
  assert.equal(malformed.statusCode, 401);
});
