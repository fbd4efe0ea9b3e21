import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string) => fileURLToPath(new URL(`./packages/pairwire-${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@pairwire/codec": pkg("codec"),
      "@pairwire/wire": pkg("wire"),
      "@pairwire/core": pkg("core"),
      "@pairwire/tcp": pkg("tcp"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
  },
});
