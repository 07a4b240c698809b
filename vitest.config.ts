import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import path from "node:path";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@maintainer-pulse/core": path.join(rootDir, "packages/core/src/index.ts"),
      "@maintainer-pulse/provider-github": path.join(rootDir, "packages/provider-github/src/index.ts"),
      "@maintainer-pulse/renderer-json": path.join(rootDir, "packages/renderer-json/src/index.ts"),
      "@maintainer-pulse/renderer-markdown": path.join(rootDir, "packages/renderer-markdown/src/index.ts"),
      "@maintainer-pulse/cli": path.join(rootDir, "packages/cli/src/index.ts")
    }
  },
  test: {
    environment: "node",
    include: ["packages/**/test/**/*.test.ts"]
  }
});
