import { API_ERROR_CODES, type ApiError, type ApiErrorCode } from "@hello/contracts";

export class ApiRequestError extends Error {
  readonly status: number;
  readonly code: ApiErrorCode;
  readonly details?: ApiError["details"];

  constructor(status: number, code: ApiErrorCode, message: string, details?: ApiError["details"]) {
    super(message);
    this.name = "ApiRequestError";
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isApiErrorCode(value: unknown): value is ApiErrorCode {
  return API_ERROR_CODES.some((code) => code === value);
}

function toApiError(body: unknown): ApiError | null {
  if (!isRecord(body) || !isApiErrorCode(body.code) || typeof body.message !== "string" || !body.message) {
    return null;
  }

  return {
    code: body.code,
    message: body.message,
    details: isRecord(body.details) ? body.details : undefined,
  };
}

async function toApiRequestError(response: Response): Promise<ApiRequestError> {
  let body: unknown;

  try {
    body = await response.json();
  } catch {
    body = undefined;
  }

  const apiError = toApiError(body);

  if (apiError) {
    return new ApiRequestError(response.status, apiError.code, apiError.message, apiError.details);
  }

  return new ApiRequestError(response.status, "INTERNAL_ERROR", `Request failed: ${response.status}`);
}

export async function fetchJson<T>(
  input: string,
  parse: (body: unknown) => T,
  init?: RequestInit,
): Promise<T> {
  const response = await fetch(input, init);

  if (!response.ok) {
    throw await toApiRequestError(response);
  }

  return parse(await response.json());
}
