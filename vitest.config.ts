import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["licensectl/test/**/*.test.ts"],
    environment: "node",
  },
});
