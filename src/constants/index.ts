export const QUOTA_DURATIONS = {
  DAILY: 60 * 60 * 24,
  WEEKLY: 60 * 60 * 24 * 7,
  MONTHLY: 60 * 60 * 24 * 30
} as const;

export const RATE_LIMITS = {
  TRANSFER: {
    windowMs: 60 * 1000,
    max: 600
  },
  ADMIN: {
    windowMs: 15 * 60 * 1000,
    max: 300
  },
  QUERY: {
    windowMs: 15 * 60 * 1000,
    max: 1000
  }
} as const;

export const REGISTRY = {
  KEY_PREFIX: 'rate-limit:path',
  MAX_UPDATE_ATTEMPTS: 3,
  MAX_TRANSACTION_CONNECTIONS: 8
} as const;

export const LIMITS = {
  MAX_QUOTAS_PER_PATH: 16,
  MAX_ID_LENGTH: 256,
  MAX_QUOTA_NAME_LENGTH: 64,
  // Keeps `now + duration` a safe integer and a representable Date.
  MAX_QUOTA_DURATION: 60 * 60 * 24 * 365 * 100
} as const;
