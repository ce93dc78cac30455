import swc from 'unplugin-swc';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    plugins: [
        // SWC required to support decorators used in PropertySyncPlugin
        swc.vite({
            jsc: {
                transform: {
                    useDefineForClassFields: false,
                    legacyDecorator: true,
                    decoratorMetadata: true,
                },
            },
        }),
    ],
    test: {
        include: ['test/**/*.spec.ts'],
        setupFiles: ['test/setup.ts'],
        testTimeout: 30_000,
    },
});
