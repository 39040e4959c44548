import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { ApiRouteError } from "../domain/api-route-error.js";
import { apiErrorHandler, notFoundHandler } from "./http.js";

function createAppThrowing(error: unknown) {
  const app = express();

  app.get("/boom", () => {
    throw error;
  });
  app.use(notFoundHandler);
  app.use(apiErrorHandler);

  return app;
}

describe("apiErrorHandler", () => {
  it("maps unexpected errors to a 500 INTERNAL_ERROR payload", async () => {
    const response = await request(createAppThrowing(new Error("database exploded"))).get("/boom");

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      code: "INTERNAL_ERROR",
      message: "Unexpected server error.",
    });
  });

  it("keeps status, code, and details of route errors", async () => {
    const error = new ApiRouteError(404, "NOT_FOUND", "Greeting missing.", { locale: "fr" });

    const response = await request(createAppThrowing(error)).get("/boom");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      code: "NOT_FOUND",
      message: "Greeting missing.",
      details: { locale: "fr" },
    });
  });
});

describe("notFoundHandler", () => {
  it("reports the unmatched method and path", async () => {
    const response = await request(createAppThrowing(new Error("unused"))).post("/missing");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      code: "NOT_FOUND",
      message: "Route not found: POST /missing",
    });
  });
});
