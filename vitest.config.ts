import { defineConfig } from "vitest/config";
import path from "path";
import { fileURLToPath } from "url";

export default defineConfig({
  root: path.dirname(fileURLToPath(import.meta.url)),
  test: {
    environment: "node",
    include: ["server/**/*.test.ts", "server/**/*.spec.ts"],
    globals: true,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'json'],
      include: [
        'server/suggestion/model/**/*.ts',
        'server/suggestion/optimizer/**/*.ts',
        'server/suggestion/service/**/*.ts',
        'server/suggestion/utils/**/*.ts',
      ],
      exclude: [
        '**/*.test.ts',
        '**/index.ts',
        '**/*.types.ts',
      ],
    },
  },
});
