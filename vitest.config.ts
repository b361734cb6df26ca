import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@pipewright/pipewright": fileURLToPath(new URL("./src/index.ts", import.meta.url)),
    },
  },
});
