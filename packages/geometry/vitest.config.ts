import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@quantgeo/geometry",
    globals: true,
    environment: "node",
  },
});
