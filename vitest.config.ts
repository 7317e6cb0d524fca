import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic"
  },
  test: {
    globals: true,
    environment: "node",
    setupFiles: ["./app/src/tests/setup.ts"],
    include: ["app/src/tests/**/*.test.{ts,tsx}"]
  }
});
