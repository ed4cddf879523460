import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import path from "node:path";

const root = fileURLToPath(new URL("./", import.meta.url));

export default defineConfig({
  test: {
    // One run covers every workspace: core sources, core integration tests and the testkit.
    include: ["packages/**/src/**/*.test.ts", "packages/**/tests/**/*.test.ts"],
    setupFiles: [path.join(root, "packages/core/tests/setup/global.ts")],
  },
});
