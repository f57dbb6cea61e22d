import { defineConfig } from 'tsup';

export default defineConfig({
    entry: ['src/cli/index.ts'],
    format: ['esm'],
    target: 'node20',
    outDir: 'dist/bundle',
    clean: true,
    splitting: false,
    sourcemap: false,
    dts: false,
    // The shebang comes from src/cli/index.ts
    // pino-pretty is loaded by pino's transport worker at runtime
    external: ['pino-pretty'],
});
