import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@unitvec/config",
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
