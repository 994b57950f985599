import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  test: {
    include: ["apps/**/tests/*.spec.{ts,tsx}", "packages/**/tests/*.spec.{ts,tsx}"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/coverage/**"],
    coverage: {
      clean: true,
      reporter: ["json-summary", "html", "text"],
      provider: "v8",
      include: ["packages/*/src/**", "apps/*/src/lib/**"],
    },
  },
});
