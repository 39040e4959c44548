import { describe, expect, it } from "vitest";
import { ApiRequestError } from "./client";
import { toUiError } from "./error-ui";

describe("toUiError", () => {
  it("maps known api error codes to user-friendly copy", () => {
    const error = new ApiRequestError(404, "NOT_FOUND", "Route not found: GET /api/hello");

    expect(toUiError(error)).toEqual({
      message: "Greeting endpoint is not available on this backend.",
      retryable: false,
    });
  });

  it("marks retryable api failures", () => {
    const error = new ApiRequestError(500, "INTERNAL_ERROR", "internal");

    expect(toUiError(error)).toEqual({
      message: "Internal server error. Try again in a moment.",
      retryable: true,
    });
  });

  it("explains network and cross-origin failures", () => {
    expect(toUiError(new TypeError("Failed to fetch"))).toEqual({
      message: "Backend is unreachable. Check that it is running and allows this origin.",
      retryable: true,
    });
  });

  it("uses plain error messages and the fallback otherwise", () => {
    expect(toUiError(new Error("Unexpected greeting payload from backend."))).toEqual({
      message: "Unexpected greeting payload from backend.",
      retryable: true,
    });
    expect(toUiError("nope", "Unable to load greeting.")).toEqual({
      message: "Unable to load greeting.",
      retryable: true,
    });
  });
});
