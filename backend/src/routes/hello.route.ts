// Serves the static greeting; flow is GET /api/hello -> typed HelloResponse JSON.
import { Router } from "express";
import type { HelloResponse } from "@hello/contracts";
import { notFoundHandler } from "./http.js";

export const HELLO_MESSAGE = "Hello from Python!";

const router = Router({ caseSensitive: true, strict: true });

router.get("/hello", (_req, res) => {
  const body: HelloResponse = { message: HELLO_MESSAGE };
  res.json(body);
});

// Other methods on the path fall through to NOT_FOUND instead of Express's automatic OPTIONS reply.
router.all("/hello", notFoundHandler);

export default router;
