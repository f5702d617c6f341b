import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

export default defineConfig({
    resolve: {
        alias: {
            "@spanwise/engine": fileURLToPath(new URL("./packages/engine/src/index.ts", import.meta.url)),
        },
    },
    test: {
        include    : [
            "packages/*/src/**/__tests__/**/*.test.ts",
            "apps/*/src/**/__tests__/**/*.test.ts",
        ],
        environment: "node",
    },
});
