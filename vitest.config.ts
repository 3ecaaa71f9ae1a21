import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        testTimeout: 30000,
        include: ["src/test/**/*.test.ts"],
    },
});
