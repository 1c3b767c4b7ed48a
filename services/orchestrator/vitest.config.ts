import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@clipcast/shared": path.resolve(__dirname, "../../packages/shared/src"),
    },
  },
});
