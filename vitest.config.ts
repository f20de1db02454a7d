import { defineConfig } from "vitest/config";
import fs from "node:fs";
import { fileURLToPath } from "node:url";

const src = fileURLToPath(new URL("./src", import.meta.url));

export default defineConfig({
  define: {
    __DEV__: true,
  },
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    benchmark: {
      include: ["src/**/__benches__/**/*.bench.ts"],
    },
    // alias for every top level source directory (type_primitives, utils, ...)
    alias: Object.fromEntries(
      fs
        .readdirSync(src, { withFileTypes: true })
        .filter((dirent) => dirent.isDirectory() && !dirent.name.startsWith("__"))
        .map((dirent) => [dirent.name, `${src}/${dirent.name}`]),
    ),
  },
});
