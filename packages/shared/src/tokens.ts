import { createHash, randomBytes } from "node:crypto";
import { SignJWT, jwtVerify } from "jose";

const textEncoder = new TextEncoder();

export const extractBearerToken = (authHeader?: string) => {
  if (!authHeader?.startsWith("Bearer ")) {
    return null;
  }
  return authHeader.slice(7);
};

export const signAccessToken = async (input: {
  userId: string;
  secret: string;
  ttlSeconds: number;
  issuer?: string;
}) => {
  const nowSeconds = Math.floor(Date.now() / 1000);
  const jwt = new SignJWT({ type: "access" })
    .setProtectedHeader({ alg: "HS256", typ: "JWT" })
    .setSubject(input.userId)
    .setIssuedAt(nowSeconds)
    .setExpirationTime(nowSeconds + input.ttlSeconds);
  if (input.issuer) {
    jwt.setIssuer(input.issuer);
  }
  return jwt.sign(textEncoder.encode(input.secret));
};

/** Resolves to the user id carried in `sub`; throws on a bad signature, expiry or token type. */
export const verifyAccessToken = async (
  token: string,
  options: { secret: string; issuer?: string }
) => {
  const { payload } = await jwtVerify(token, textEncoder.encode(options.secret), {
    algorithms: ["HS256"],
    issuer: options.issuer
  });
  if (payload.type !== "access") {
    throw new Error("jwt_wrong_token_type");
  }
  if (!payload.sub || !payload.exp) {
    throw new Error("jwt_missing_required_claims");
  }
  return payload.sub;
};

export const generateOpaqueToken = () => randomBytes(32).toString("base64url");

export const hashToken = (token: string) => createHash("sha256").update(token).digest("hex");
