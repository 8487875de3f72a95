import { defineConfig, type Options } from "tsup";

export const baseConfig: Options = {
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: false,
  target: "es2022",
  outDir: "dist",
  // Workspace packages and node_modules stay external
  skipNodeModulesBundle: true,
  external: [/^@chainproof\/.*/],
};

export default defineConfig(baseConfig);
