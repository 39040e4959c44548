import type { ApiErrorCode } from "@hello/contracts";
import { ApiRequestError } from "./client";

type UiError = {
  message: string;
  retryable: boolean;
};

const RETRYABLE_CODES = new Set<ApiErrorCode>(["INTERNAL_ERROR"]);

const COPY_BY_CODE: Record<ApiErrorCode, string> = {
  NOT_FOUND: "Greeting endpoint is not available on this backend.",
  INTERNAL_ERROR: "Internal server error. Try again in a moment.",
};

export function toUiError(error: unknown, fallback = "Unexpected request failure"): UiError {
  if (error instanceof ApiRequestError) {
    return {
      message: COPY_BY_CODE[error.code],
      retryable: RETRYABLE_CODES.has(error.code),
    };
  }

  // fetch rejects with a TypeError when the browser blocks the response (CORS) or the backend is down.
  if (error instanceof TypeError) {
    return {
      message: "Backend is unreachable. Check that it is running and allows this origin.",
      retryable: true,
    };
  }

  if (error instanceof Error && error.message) {
    return {
      message: error.message,
      retryable: true,
    };
  }

  return {
    message: fallback,
    retryable: true,
  };
}
