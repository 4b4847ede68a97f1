import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // setup tests call process.chdir, which worker threads do not allow
    pool: "forks",
  },
});
