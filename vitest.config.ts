import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["tests/**/*.test.ts"],
        // Pid files are keyed on process.pid; keep each test file in its own process
        pool: "forks",
        testTimeout: 10000,
    },
});
