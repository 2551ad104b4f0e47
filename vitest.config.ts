import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts", "services/*/tests/**/*.test.ts"],
    environment: "node"
  }
});
