import { defineConfig } from "vitest/config";

// Timing checks depend on the machine, so they only run under `npm run bench`
const bench = Boolean(process.env.VITEST_PERF);

export default defineConfig({
  test: {
    environment: "node",
    include: bench
      ? ["packages/*/benchmarks/**/*.bench.ts"]
      : ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
