import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@adt-prelude/prelude",
    globals: true,
    environment: "node",
  },
});
