import { describe, it, expect } from 'vitest';
import { getPort, getRegistryDriver, loadConfig, validateEnvironment } from '@/lib/env';

describe('environment', () => {
    it('defaults to the redis driver on port 3000', () => {
        expect(getRegistryDriver({})).toBe('redis');
        expect(getPort({})).toBe(3000);
    });

    it('requires REDIS_URL for the redis driver', () => {
        expect(() => validateEnvironment({})).toThrow('Missing required environment variables: REDIS_URL');
        expect(() => validateEnvironment({ REDIS_URL: 'redis://localhost:6379' })).not.toThrow();
    });

    it('does not need redis for the memory driver', () => {
        expect(() => validateEnvironment({ REGISTRY_DRIVER: 'memory' })).not.toThrow();
    });

    it('rejects unknown drivers and bad ports', () => {
        expect(() => validateEnvironment({ REGISTRY_DRIVER: 'disk' })).toThrow(
            'REGISTRY_DRIVER must be one of redis, memory, got "disk"'
        );
        expect(() => validateEnvironment({ REGISTRY_DRIVER: 'memory', PORT: 'http' })).toThrow(
            'PORT must be an integer between 0 and 65535, got "http"'
        );
    });

    it('builds the config from the environment', () => {
        expect(
            loadConfig({
                REGISTRY_DRIVER: 'redis',
                REDIS_URL: 'redis://cache:6379',
                PORT: '8080',
                REGISTRY_KEY_PREFIX: 'limits',
                BOOTSTRAP_PATHS_FILE: 'config/paths.json'
            })
        ).toEqual({
            port: 8080,
            registryDriver: 'redis',
            redisUrl: 'redis://cache:6379',
            registryKeyPrefix: 'limits',
            bootstrapPathsFile: 'config/paths.json'
        });

        expect(loadConfig({ REGISTRY_DRIVER: 'memory' })).toEqual({
            port: 3000,
            registryDriver: 'memory',
            redisUrl: undefined,
            registryKeyPrefix: 'rate-limit:path',
            bootstrapPathsFile: undefined
        });
    });
});
