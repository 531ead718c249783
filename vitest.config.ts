import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    globals: false,
  },
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "."),
    },
  },
  // Route handlers import next/server; keep it out of dependency pre-bundling
  optimizeDeps: {
    exclude: ["next", "next/server"],
  },
});
