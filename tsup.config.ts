import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["scripts/index.ts", "scripts/format/index.ts"],
  format: ["esm"],
  target: "node20",
  outDir: "bundle",
  clean: true,
  splitting: true,
  sourcemap: true,
  dts: false,
});
