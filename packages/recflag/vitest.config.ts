import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "recflag",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
