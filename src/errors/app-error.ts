import type { Path } from '@/models/path';

export type ErrorContext = Record<string, string | number | boolean | null>;

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public context?: ErrorContext
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(400, message, context);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(404, message, context);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(409, message, context);
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

export class InternalError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(500, message, context);
    Object.setPrototypeOf(this, InternalError.prototype);
  }
}

export interface RateLimitExceededDetails {
  path: Path;
  amount: bigint;
  quotaName: string;
  used: bigint;
  max: bigint;
  periodEnd: number;
}

const describeInstant = (seconds: number): string => {
  const date = new Date(seconds * 1000);
  return Number.isNaN(date.getTime()) ? `${seconds} (unix seconds)` : date.toISOString();
};

/**
 * A transfer would push a window's net balance past its cap.
 *
 * `used` is the balance before the rejected transfer; callers can retry once
 * `periodEnd` (seconds) has passed.
 */
export class RateLimitExceededError extends AppError {
  public readonly details: RateLimitExceededDetails;

  constructor(details: RateLimitExceededDetails) {
    const { path, amount, quotaName, used, max, periodEnd } = details;
    super(
      429,
      `Rate limit exceeded for ${path.owner}/${path.channel}/${path.asset}. ` +
        `Tried to transfer ${amount} which exceeds capacity on the '${quotaName}' quota (${used}/${max}). ` +
        `Try again after ${describeInstant(periodEnd)}`,
      {
        owner: path.owner,
        channel: path.channel,
        asset: path.asset,
        amount: amount.toString(),
        quotaName,
        used: used.toString(),
        max: max.toString(),
        periodEnd
      }
    );
    this.details = details;
    Object.setPrototypeOf(this, RateLimitExceededError.prototype);
  }
}

export class QuotaNotFoundError extends NotFoundError {
  constructor(path: Path, quotaName: string) {
    super(`Quota ${quotaName} not found for ${path.owner}/${path.channel}/${path.asset}`, {
      quotaName,
      owner: path.owner,
      channel: path.channel,
      asset: path.asset
    });
    Object.setPrototypeOf(this, QuotaNotFoundError.prototype);
  }
}

export class PathNotFoundError extends NotFoundError {
  constructor(path: Path) {
    super(`No rate limits registered for ${path.owner}/${path.channel}/${path.asset}`, {
      owner: path.owner,
      channel: path.channel,
      asset: path.asset
    });
    Object.setPrototypeOf(this, PathNotFoundError.prototype);
  }
}

export class RegistryEncodingError extends InternalError {
  constructor(key: string, reason: string) {
    super(`Stored rate limits for ${key} could not be decoded: ${reason}`, { key });
    Object.setPrototypeOf(this, RegistryEncodingError.prototype);
  }
}

export class ConcurrentUpdateError extends ConflictError {
  constructor(key: string) {
    super(`Rate limits for ${key} were modified concurrently`, { key });
    Object.setPrototypeOf(this, ConcurrentUpdateError.prototype);
  }
}
