import { fileURLToPath } from "node:url";

import { configDefaults, defineConfig } from "vitest/config";

const engine = fileURLToPath(new URL("../querylens/src/", import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "querylens/sqlite": `${engine}integrations/sqlite.ts`,
      querylens: `${engine}index.ts`,
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
    exclude: [...configDefaults.exclude, "**/dist/**", "tests/fixtures/**"],
    globals: false,
  },
});
