import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    globals: true,
    setupFiles: [],
    reporters: ["default"],
    coverage: {
      enabled: false,
    },
  },

  // Keep in sync with "paths" in tsconfig.json
  resolve: {
    alias: {
      "@/core": fromRoot("./src/lib/core"),
      "@/lib": fromRoot("./src/lib"),
    },
  },
});
