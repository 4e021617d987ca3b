import { readFileSync } from "node:fs";
import { defineConfig } from "tsup";

// Read version from package.json at build time
const pkg: unknown = JSON.parse(
  readFileSync(new URL("./package.json", import.meta.url), "utf-8")
);
const version =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  target: "node20",
  platform: "node",
  splitting: false,
  sourcemap: false,
  minify: false,
  treeshake: true,
  outExtension() {
    return { js: ".mjs" };
  },

  // Bundle the workspace packages into the CLI
  noExternal: ["@taskline/core", "@taskline/shared"],

  // Third-party dependencies are installed alongside the CLI
  external: [/^node:/, "@iarna/toml", "@inquirer/prompts", "chalk", "commander", "string-width", "table", "zod"],

  esbuildOptions(options) {
    // Inject version from package.json at build time
    options.define = {
      ...options.define,
      __VERSION__: JSON.stringify(version),
    };
  },
});
