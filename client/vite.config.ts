/**
 * vite.config.ts
 *
 * Bundles the browser entry scripts into `public/static/`, which the server
 * serves below `/static/`. Every entry keeps a stable `[name].js` file name
 * because the server-rendered pages reference them directly.
 *
 * During development `npm run dev:client` rebuilds on change while the
 * Fastify server runs separately.
 */

import {fileURLToPath} from "node:url";
import {defineConfig} from "vite";

const here = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
    // Copied verbatim next to the bundles (tracker.css)
    publicDir: here("./public"),
    build: {
        outDir: here("../public/static"),
        emptyOutDir: true,
        sourcemap: true,
        target: "es2020",
        rollupOptions: {
            input: {
                main: here("./src/main.ts"),
                admin: here("./src/admin.ts"),
            },
            output: {
                entryFileNames: "[name].js",
                chunkFileNames: "chunks/[name]-[hash].js",
                assetFileNames: "assets/[name][extname]",
            },
        },
    },
});
