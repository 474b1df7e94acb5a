import {defineConfig} from "vitest/config";

export default defineConfig({
  test: {
    pool: "threads",
    include: ["packages/*/test/unit/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    unstubEnvs: true,
  },
});
