import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['__tests__/**/*.test.ts'],
        env: {
            NODE_ENV: 'test',
            LOG_SILENT: 'true'
        }
    },
    resolve: {
        alias: {
            '@': path.resolve(__dirname, 'src')
        }
    }
});
