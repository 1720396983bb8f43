import { randomBytes, scrypt, timingSafeEqual } from "node:crypto";
const KEY_LENGTH = 64;
const SALT_BYTES = 16;
const SPECIAL_CHARACTERS = /[!@#$%^&*(),.?":{}|<>]/;

const derive = (password: string, salt: Buffer) =>
  new Promise<Buffer>((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, (error, key) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(key);
    });
  });

export const hashPassword = async (password: string) => {
  const salt = randomBytes(SALT_BYTES);
  const key = await derive(password, salt);
  return `scrypt$${salt.toString("base64url")}$${key.toString("base64url")}`;
};

export const verifyPassword = async (password: string, stored: string) => {
  const [scheme, saltText, hashText] = stored.split("$");
  if (scheme !== "scrypt" || !saltText || !hashText) {
    return false;
  }
  const expected = Buffer.from(hashText, "base64url");
  const actual = await derive(password, Buffer.from(saltText, "base64url"));
  return expected.length === actual.length && timingSafeEqual(expected, actual);
};

/** Returns the unmet password rules; an empty list means the password is acceptable. */
export const checkPasswordStrength = (password: string) => {
  const problems: string[] = [];
  if (password.length < 8) {
    problems.push("Password must be at least 8 characters long");
  }
  if (!/\d/.test(password)) {
    problems.push("Password must contain at least one digit");
  }
  if (!/[A-Z]/.test(password)) {
    problems.push("Password must contain at least one uppercase letter");
  }
  if (!SPECIAL_CHARACTERS.test(password)) {
    problems.push("Password must contain at least one special character");
  }
  return problems;
};
