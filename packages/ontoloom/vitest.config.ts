import { fileURLToPath } from "node:url";

import { configDefaults, defineConfig } from "vitest/config";

function fromHere(path: string): string {
  return fileURLToPath(new URL(path, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      "ontoloom/turtle": fromHere("./src/turtle/index.ts"),
      "ontoloom/interchange": fromHere("./src/interchange/index.ts"),
      ontoloom: fromHere("./src/index.ts"),
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
    exclude: [
      ...configDefaults.exclude,
      "**/dist/**",
      "**/.{idea,git,cache,output,temp}/**",
    ],
    globals: false,
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.d.ts"],
      thresholds: {
        branches: 70,
        functions: 80,
        lines: 80,
      },
    },
  },
});
