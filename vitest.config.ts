import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

function workspaceSource(path: string): string {
  return fileURLToPath(new URL(`./packages/${path}`, import.meta.url));
}

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    alias: {
      "@statbeacon/logger": workspaceSource("logger/src/index.ts"),
      "@statbeacon/core": workspaceSource("core/src/index.ts"),
      "@statbeacon/storage": workspaceSource("storage/src/index.ts"),
    },
  },
});
