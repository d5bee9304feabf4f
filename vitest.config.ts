import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["flooder/src/**/__tests__/**/*.test.ts"],
  },
});
