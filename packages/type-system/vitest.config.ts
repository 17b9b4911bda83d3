import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@adt-prelude/type-system",
    globals: true,
    environment: "node",
  },
});
