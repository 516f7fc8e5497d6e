import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.{ts,tsx}"],
    globals: true,
    restoreMocks: true,
    clearMocks: true,
    unstubEnvs: true,
  },
});
