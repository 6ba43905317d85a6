import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
      LAYOUT_CALIBRATION_FACTOR: "400",
      LAYOUT_BASE_FONT_SIZE: "11",
      LAYOUT_MAX_FONT_SIZE: "48",
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/cli.ts"],
      reporter: ["text"],
      reportsDirectory: ".coverage",
      thresholds: {
        lines: 85,
      },
    },
  },
});
