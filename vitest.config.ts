import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["driver/src/**/*.test.ts"],
    globals: true,
    environment: "node",
  },
});
