// Defines shared API contracts; data flows backend responses <-> frontend client using the same types.
export type HelloResponse = {
  message: string;
};

export const API_ERROR_CODES = ["NOT_FOUND", "INTERNAL_ERROR"] as const;

export type ApiErrorCode = (typeof API_ERROR_CODES)[number];

export type ApiError = {
  code: ApiErrorCode;
  message: string;
  details?: Record<string, unknown>;
};
