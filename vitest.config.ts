import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    setupFiles: ["./vitest.setup.ts"],
    server: {
      deps: {
        // its node entry point doesn't load; run the ESM sources through vite
        inline: ["wgsl_reflect"],
      },
    },
  },
});
