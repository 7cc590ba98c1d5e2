/**
 * vitest.config.ts
 *
 * Single test run for server and client. Server tests run under Node;
 * client test files opt into jsdom with a `@vitest-environment jsdom`
 * docblock.
 */

import {defineConfig} from "vitest/config";

export default defineConfig({
    test: {
        include: ["server/tests/**/*.test.ts", "client/tests/**/*.test.ts"],
        environment: "node",
    },
});
