import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const PACKAGES = [
  "types",
  "errors",
  "logger",
  "config",
  "observability",
  "chunker",
  "embeddings",
  "llm",
  "vector-store",
  "core",
  "strategies",
  "queue",
];

// Packages exposing in-process fakes under `@ragweave/<name>/testing`
const TESTING_ENTRIES = ["embeddings", "llm", "observability", "strategies"];

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: [
      ...TESTING_ENTRIES.map((name) => ({
        find: `@ragweave/${name}/testing`,
        replacement: source(`./packages/${name}/src/testing.ts`),
      })),
      ...PACKAGES.map((name) => ({
        find: new RegExp(`^@ragweave/${name}$`),
        replacement: source(`./packages/${name}/src/index.ts`),
      })),
    ],
  },
});
