// Cross-origin policy for every route: one trusted browser origin, credentials allowed, any method or header.
import cors, { type CorsOptions } from "cors";
import type { Request, RequestHandler } from "express";

export const ALLOWED_ORIGINS: readonly string[] = ["http://localhost:3000"];

// Request headers are reflected by leaving allowedHeaders unset.
const ALLOWED_METHODS = ["DELETE", "GET", "HEAD", "OPTIONS", "PATCH", "POST", "PUT"];

const CORS_OPTIONS: CorsOptions = {
  origin: [...ALLOWED_ORIGINS],
  credentials: true,
  methods: ALLOWED_METHODS,
};

export function isPreflightRequest(req: Request): boolean {
  return req.method === "OPTIONS" && req.headers["access-control-request-method"] !== undefined;
}

// Preflights end here with 204; a plain OPTIONS gets the headers and continues to routing.
export function createCorsMiddleware(): RequestHandler {
  const preflight = cors(CORS_OPTIONS);
  const passThrough = cors({ ...CORS_OPTIONS, preflightContinue: true });

  return (req, res, next) => {
    if (isPreflightRequest(req)) {
      preflight(req, res, next);
      return;
    }

    passThrough(req, res, next);
  };
}
