import { defineConfig } from "tsup";
import { readFileSync } from "fs";

const pkg = JSON.parse(readFileSync("./package.json", "utf-8")) as {
  version: string;
};

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  target: "node20",
  sourcemap: true,
  clean: true,
  banner: {
    js: "#!/usr/bin/env node",
  },
  // Bundle @agent-sidecar/core since it's a private workspace package not published to npm
  noExternal: ["@agent-sidecar/core"],
  // Inject version from package.json at build time
  define: {
    __INJECTOR_VERSION__: JSON.stringify(pkg.version),
  },
});
