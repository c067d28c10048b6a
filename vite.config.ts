import { defineConfig } from 'vite';
import { fileURLToPath } from 'url';
import dts from 'vite-plugin-dts';

export default defineConfig({
    build: {
        target: 'node20',
        lib: {
            entry: fileURLToPath(new URL('src/index.ts', import.meta.url)),
            name: 'FleetRoutePlanner',
            formats: ['es', 'cjs'],
            fileName: format => `planner.${format}.js`,
        },
        rollupOptions: {
            external: ['fs', 'fs/promises', 'path', 'zod', 'glob'],
        },
        sourcemap: true,
        emptyOutDir: true,
    },
    plugins: [
        dts({
            entryRoot: 'src',
            exclude: ['**/*.test.ts'],
            outDir: 'dist',
        }),
    ],
    define: {
        'import.meta.vitest': 'undefined',
    },
});
