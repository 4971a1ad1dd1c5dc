import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["evaluator/tests/**/*.test.ts", "keypad/tests/**/*.test.ts", "cli/tests/**/*.test.ts"],
        environment: "node",
    },
});
