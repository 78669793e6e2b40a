import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["cmake-fetch/test/**/*.test.ts"],
    environment: "node",
  },
});
