import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["cjs"],
  target: "node20",
  platform: "node",
  outDir: "dist",
  clean: true,
  splitting: false,
  sourcemap: false,
  dts: false,

  // Workspace packages publish TypeScript sources, so they are bundled in
  noExternal: [/^@squaremerge\//],

  banner: {
    js: "#!/usr/bin/env node",
  },
});
