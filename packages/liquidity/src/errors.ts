import type { ZodIssue } from 'zod';

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`).join('; ');
}

/**
 * Invalid per-timeframe configuration. Values are never clamped.
 */
export class TimeframeConfigError extends Error {
  constructor(
    public readonly timeframe: string,
    public readonly issues: ZodIssue[]
  ) {
    super(`Invalid config for ${timeframe}: ${formatIssues(issues)}`);
    this.name = 'TimeframeConfigError';
  }
}

/**
 * A zone that fails validation (e.g. priceLow above priceHigh)
 */
export class ZoneValidationError extends Error {
  constructor(
    public readonly zoneId: string,
    public readonly issues: ZodIssue[]
  ) {
    super(`Invalid zone ${zoneId}: ${formatIssues(issues)}`);
    this.name = 'ZoneValidationError';
  }
}

/**
 * A refresh was started for a timeframe that is already refreshing
 */
export class RefreshInProgressError extends Error {
  constructor(public readonly timeframe: string) {
    super(`Refresh already in progress for ${timeframe}`);
    this.name = 'RefreshInProgressError';
  }
}
