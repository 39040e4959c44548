import react from "@vitejs/plugin-react";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: "backend",
          include: ["backend/src/**/*.test.ts"],
          environment: "node",
        },
      },
      {
        plugins: [react()],
        test: {
          name: "frontend",
          include: ["frontend/src/**/*.test.{ts,tsx}"],
          environment: "jsdom",
          setupFiles: ["frontend/src/test/setup.ts"],
        },
      },
    ],
  },
});
