import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    coverage: {
      enabled: true,
      include: ["src/**/*.ts"],
      exclude: ["src/types.d.ts"],
      reporter: ["json-summary", "text", "text-summary"],
      provider: "v8",
      reportOnFailure: true,
      allowExternal: false,
    },
    reporters: ["verbose", "github-actions"],
  },
});
