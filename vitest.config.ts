import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    server: {
      deps: {
        // clipanion 3.x .mjs files import the "../platform" directory, which
        // Node ESM cannot resolve; let Vite resolve it instead.
        inline: ["clipanion"],
      },
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        "src/index.ts",
        "src/cli/program.ts",
        "src/config/types.ts",
        "src/sources/*/types.ts",
      ],
    },
  },
});
