import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@quantgeo/core",
    globals: true,
    environment: "node",
  },
});
