import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (pkg: string) =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@pixelstage/core": source("core"),
      "@pixelstage/export": source("export"),
    },
  },
  test: {
    include: ["packages/*/__tests__/**/*.test.ts"],
  },
});
