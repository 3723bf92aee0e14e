import type { KnipConfig } from "knip";

const config: KnipConfig = {
  workspaces: {
    "packages/querylens": {
      entry: ["src/index.ts", "src/integrations/sqlite.ts"],
      project: ["src/**/*.ts", "tests/**/*.ts"],
      ignore: ["**/test-utils.ts"],
    },
    "packages/cli": {
      entry: ["src/main.ts", "tests/fixtures/*.ts"],
      project: ["src/**/*.ts", "tests/**/*.ts"],
    },
  },
};

export default config;
