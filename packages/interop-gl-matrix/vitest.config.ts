import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@unitvec/interop-gl-matrix",
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
