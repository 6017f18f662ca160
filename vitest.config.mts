import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/tests/**/*.test.ts", "services/runner/tests/**/*.test.ts"],
    globals: true,
    setupFiles: ["backend/tests/setup.ts"]
  }
});
