import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packageEntry = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@funky/prelude": packageEntry("prelude"),
      "@funky/maybe": packageEntry("maybe"),
      "@funky/trial": packageEntry("trial"),
      "@funky/zod": packageEntry("zod"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.spec.ts"],
    environment: "node",
  },
});
