import { defineConfig } from "tsup";
import { baseConfig } from "../../packages/tsup.config.base.ts";

export default defineConfig({
  ...baseConfig,
  entry: ["src/cli.ts"],
  dts: false,
  // Shebang for the CLI executable
  banner: {
    js: "#!/usr/bin/env node",
  },
});
