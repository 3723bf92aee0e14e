import { defineConfig } from "tsup";

export default defineConfig({
  entry: { main: "src/main.ts" },
  format: ["esm"],
  target: "node20",
  sourcemap: true,
  clean: true,
  noExternal: ["querylens"],
  external: ["better-sqlite3"],
  banner: { js: "#!/usr/bin/env node" },
});
