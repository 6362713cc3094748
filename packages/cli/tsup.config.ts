import { defineConfig } from "tsup";

export default defineConfig({
  entry: { stepwise: "bin/stepwise.ts" },
  format: ["esm"],
  target: "node20",
  clean: true,
  sourcemap: true,
  // Workspace packages export their TypeScript sources, so they are bundled in
  noExternal: [/^@stepwise\//],
});
