import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      {
        extends: "./vitest.shared.ts",
        test: {
          name: "stamp-primitives",
          include: ["packages/**/src/**/*.test.ts", "packages/**/src/**/*.spec.ts"],
        },
      },
      {
        extends: "./vitest.shared.ts",
        test: {
          name: "stamp-api",
          include: ["services/**/src/**/*.test.ts", "services/**/src/**/*.spec.ts"],
        },
      },
    ],
  },
});
