import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["src/core/**/*.ts", "src/bridge/**/*.ts", "src/rpc/**/*.ts", "src/models.ts", "src/config.ts", "src/log.ts", "src/clipboard.ts", "src/ui/format.ts"],
      exclude: ["src/**/*.test.ts"],
    },
  },
});
