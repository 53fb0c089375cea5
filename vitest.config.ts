import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts", "scripts/**/*.test.ts", "scripts/tests/**/*.spec.ts"],
  },
});
