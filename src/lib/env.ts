import logger from '@/lib/logger';
import { REGISTRY } from '@/constants';

export type RegistryDriver = 'redis' | 'memory';

export interface AppConfig {
    port: number;
    registryDriver: RegistryDriver;
    redisUrl?: string;
    registryKeyPrefix: string;
    bootstrapPathsFile?: string;
}

const REGISTRY_DRIVERS: readonly RegistryDriver[] = ['redis', 'memory'];

const isRegistryDriver = (value: string): value is RegistryDriver =>
    REGISTRY_DRIVERS.some((driver) => driver === value);

export const getPort = (env: NodeJS.ProcessEnv = process.env): number => parseInt(env.PORT || '3000', 10);

export const getRegistryDriver = (env: NodeJS.ProcessEnv = process.env): RegistryDriver => {
    const driver = env.REGISTRY_DRIVER || 'redis';
    if (!isRegistryDriver(driver)) {
        throw new Error(`REGISTRY_DRIVER must be one of ${REGISTRY_DRIVERS.join(', ')}, got "${driver}"`);
    }
    return driver;
};

export const validateEnvironment = (env: NodeJS.ProcessEnv = process.env): void => {
    const problems: string[] = [];

    let driver: RegistryDriver | undefined;
    try {
        driver = getRegistryDriver(env);
    } catch (error) {
        problems.push(error instanceof Error ? error.message : String(error));
    }

    if (driver === 'redis' && !env.REDIS_URL) {
        problems.push('Missing required environment variables: REDIS_URL');
    }

    const port = getPort(env);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        problems.push(`PORT must be an integer between 0 and 65535, got "${env.PORT}"`);
    }

    if (problems.length > 0) {
        const msg = problems.join('; ');
        logger.error(msg);
        throw new Error(msg);
    }

    logger.info('✓ Environment validation passed', {
        port,
        registryDriver: driver,
        nodeEnv: env.NODE_ENV || 'development'
    });
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
    validateEnvironment(env);
    return {
        port: getPort(env),
        registryDriver: getRegistryDriver(env),
        redisUrl: env.REDIS_URL,
        registryKeyPrefix: env.REGISTRY_KEY_PREFIX || REGISTRY.KEY_PREFIX,
        bootstrapPathsFile: env.BOOTSTRAP_PATHS_FILE || undefined
    };
};
