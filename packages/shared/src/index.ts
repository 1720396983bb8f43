export { makeErrorResponse, statusForErrorCode } from "./errors.js";
export type { ErrorCode, ErrorResponse } from "./errors.js";
export { createMetricsRegistry } from "./metrics.js";
export type { MetricLabels, MetricsRegistry } from "./metrics.js";
export { hashPassword, verifyPassword, checkPasswordStrength } from "./passwords.js";
export {
  extractBearerToken,
  signAccessToken,
  verifyAccessToken,
  generateOpaqueToken,
  hashToken
} from "./tokens.js";
