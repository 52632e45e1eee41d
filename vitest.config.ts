import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 10000,
    clearMocks: true,
    restoreMocks: true,
  },
  resolve: {
    alias: [
      // Strip .js from relative imports so vite resolves .ts source files
      { find: /^(\.{1,2}\/.*)\.js$/, replacement: "$1" },
    ],
  },
});
