// vitest.config.ts
import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        globals: true, // describe/it/expect as globals
        setupFiles: ["./test/vitest.setup.ts"],
        include: ["test/**/*.test.ts"],
        coverage: {
            reporter: ["text", "html"],
            reportsDirectory: "./coverage",
            include: ["src"],
        },
        isolate: true,
        clearMocks: true,
        restoreMocks: true,
    },
});
