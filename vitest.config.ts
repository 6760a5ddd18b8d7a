import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@sightline/pipeline": path.resolve(__dirname, "packages/pipeline/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts", "tasker/tests/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
    },
  },
});
