import { defineConfig, type PluginOption } from 'vite';
import { visualizer } from 'rollup-plugin-visualizer';

export default defineConfig({
    plugins: [
        process.env.ANALYZE
            ? (visualizer({
                template: 'raw-data',
                filename: 'dist/bundle/bundle-stats.json',
                gzipSize: true,
                brotliSize: true,
            }) as PluginOption)
            : null,
    ],
    build: {
        lib: {
            entry: 'src/index.ts',
            name: 'NowPlayingSync',
            fileName: 'now-playing-sync',
            formats: ['es', 'umd'],
        },
        outDir: 'dist/bundle',
        emptyOutDir: true,
        target: 'es2018',
        sourcemap: true,
    },
});
