import path from "path";
import { defineConfig } from "vitest/config";

const packages = ["types", "runtime", "tools", "agents", "db", "worker"];

export default defineConfig({
  resolve: {
    alias: Object.fromEntries(
      packages.map((name) => [`@tool-agents/${name}`, path.resolve(__dirname, `packages/${name}/src/index.ts`)])
    ),
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    environment: "node",
    // Worker scenarios create temp directories and share the logger singleton
    fileParallelism: false,
    testTimeout: 30000,
  },
});
