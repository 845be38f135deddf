import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        include: ["tests/**/*.test.ts"],
        // Files share the process-wide event observer, so run them one at a time
        fileParallelism: false,
        sequence: {
            concurrent: false,
        },
    },
});
