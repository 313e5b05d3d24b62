import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    globals: false,
    environment: "node",
    include: ["src/**/*.test.ts"],
    testTimeout: 10000,
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "error",
      LOG_FILE: "",
    },
  },
});
