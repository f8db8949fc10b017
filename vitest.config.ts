import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    environment: "node",
    env: {
      ASKSHELL_AUDIT_DISABLED: "1",
      LOG_LEVEL: "silent",
    },
  },
});
