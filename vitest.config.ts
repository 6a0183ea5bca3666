import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    // Pipeline tests chdir into temp workspaces, which worker threads do not allow.
    pool: "forks",
  },
});
