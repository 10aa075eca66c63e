import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const resolveFromRoot = (relativePath: string): string => {
    const rootDir = path.dirname(fileURLToPath(import.meta.url));
    return path.resolve(rootDir, relativePath);
};

export default defineConfig({
    resolve: {
        alias: {
            'app': resolveFromRoot('src/app'),
            'cli': resolveFromRoot('src/cli'),
            'config': resolveFromRoot('src/config'),
            'difficulty': resolveFromRoot('src/difficulty'),
            'levels': resolveFromRoot('src/levels'),
            'physics': resolveFromRoot('src/physics'),
            'skill': resolveFromRoot('src/skill'),
            'storage': resolveFromRoot('src/storage'),
            'telemetry': resolveFromRoot('src/telemetry'),
            'util': resolveFromRoot('src/util'),
        },
    },
    test: {
        environment: 'node',
        include: ['tests/unit/**/*.spec.ts'],
        clearMocks: true,
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['src/**/*.ts'],
        },
    },
});
