import { test } from "node:test";
import assert from "node:assert/strict";
import { checkPasswordStrength, hashPassword, verifyPassword } from "./passwords.js";

test("hashed passwords verify and reject wrong input", async () => {
  const stored = await hashPassword("Correct-Horse1");
  assert.match(stored, /^scrypt\$[\w-]+\$[\w-]+$/);
  assert.equal(await verifyPassword("Correct-Horse1", stored), true);
  assert.equal(await verifyPassword("correct-horse1", stored), false);
});

test("same password hashes differently each time", async () => {
  const first = await hashPassword("Repeat#123");
  const second = await hashPassword("Repeat#123");
  assert.notEqual(first, second);
});

test("malformed stored hashes never verify", async () => {
  assert.equal(await verifyPassword("anything", "plain-text"), false);
  assert.equal(await verifyPassword("anything", "bcrypt$abc$def"), false);
});

test("password policy lists each unmet rule", () => {
  assert.deepEqual(checkPasswordStrength("Abcdef1!"), []);
  assert.deepEqual(checkPasswordStrength("abc"), [
    "Password must be at least 8 characters long",
    "Password must contain at least one digit",
    "Password must contain at least one uppercase letter",
    "Password must contain at least one special character"
  ]);
  assert.deepEqual(checkPasswordStrength("ABCDEFGH1"), [
    "Password must contain at least one special character"
  ]);
});
