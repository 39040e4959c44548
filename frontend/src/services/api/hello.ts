import type { HelloResponse } from "@hello/contracts";
import { fetchJson } from "./client";

const API_BASE_URL = import.meta.env.VITE_API_URL ?? "";

function parseHelloResponse(body: unknown): HelloResponse {
  if (typeof body === "object" && body !== null && "message" in body && typeof body.message === "string") {
    return { message: body.message };
  }

  throw new Error("Unexpected greeting payload from backend.");
}

// Cross-origin in development: the backend allows credentials for the dev server origin.
export async function getHello(): Promise<string> {
  const body = await fetchJson(`${API_BASE_URL}/api/hello`, parseHelloResponse, {
    credentials: "include",
  });

  return body.message;
}
