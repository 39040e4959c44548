// Normalizes error output; flow is unmatched route/exception -> sendRouteError -> typed ApiError JSON.
import type { ApiError, ApiErrorCode } from "@hello/contracts";
import type { ErrorRequestHandler, RequestHandler, Response } from "express";
import { isApiRouteError, routeNotFoundError } from "../domain/api-route-error.js";
import { logBackendEvent } from "../logging/logger.js";

export function sendApiError(
  res: Response,
  status: number,
  code: ApiErrorCode,
  message: string,
  details?: ApiError["details"],
) {
  const body: ApiError = details === undefined ? { code, message } : { code, message, details };
  res.status(status).json(body);
}

export function sendRouteError(res: Response, error: unknown) {
  if (isApiRouteError(error)) {
    sendApiError(res, error.status, error.code, error.message, error.details);
    return;
  }

  sendApiError(res, 500, "INTERNAL_ERROR", "Unexpected server error.");
}

export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(routeNotFoundError(req.method, `${req.baseUrl}${req.path}`));
};

export const apiErrorHandler: ErrorRequestHandler = (error, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (!isApiRouteError(error) || error.status >= 500) {
    logBackendEvent("app", "error", "request:failed", {
      method: req.method,
      path: req.path,
      error,
    });
  }

  sendRouteError(res, error);
};
