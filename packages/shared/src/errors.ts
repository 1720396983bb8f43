export type ErrorCode =
  | "invalid_request"
  | "unauthorized"
  | "forbidden"
  | "not_found"
  | "conflict"
  | "content_rejected"
  | "rate_limited"
  | "internal_error";

export type ErrorResponse = {
  error: ErrorCode;
  message: string;
  details?: string;
  debug?: { cause?: string; hint?: string };
};

type ErrorOptions = {
  details?: string;
  debug?: { cause?: string; hint?: string };
  devMode?: boolean;
};

export const makeErrorResponse = (
  error: ErrorCode,
  message: string,
  options: ErrorOptions = {}
): ErrorResponse => {
  const response: ErrorResponse = { error, message };
  if (options.details) {
    response.details = options.details;
  }
  if (options.devMode && options.debug) {
    response.debug = options.debug;
  }
  return response;
};

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  invalid_request: 400,
  content_rejected: 400,
  unauthorized: 401,
  forbidden: 403,
  not_found: 404,
  conflict: 409,
  rate_limited: 429,
  internal_error: 500
};

export const statusForErrorCode = (code: ErrorCode) => STATUS_BY_CODE[code];
