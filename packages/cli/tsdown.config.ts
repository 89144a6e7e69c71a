import { defineConfig } from "tsdown";

export default defineConfig({
  entry: ["src/main.ts"],
  outDir: "dist",
  format: "esm",
  platform: "node",
  // Workspace packages export TypeScript sources, so they are inlined into the bundle.
  noExternal: [/^@skufall\//],
  clean: true,
  sourcemap: false,
});
