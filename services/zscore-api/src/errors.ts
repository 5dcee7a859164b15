import type { ErrorResponse } from '@zscore/schemas';
import type { ZodError } from 'zod';

export type ErrorCode =
  | 'invalid_request'
  | 'company_not_found'
  | 'filing_unavailable'
  | 'quote_unavailable'
  | 'missing_line_item'
  | 'malformed_filing'
  | 'division_undefined'
  | 'upstream_unavailable';

/**
 * Base of every failure the service reports to callers. `retryable` separates
 * upstream outages ("try again later") from data that will never compute.
 */
export class ZScoreError extends Error {
  readonly code: ErrorCode;
  readonly status: number;
  readonly retryable: boolean;

  constructor(code: ErrorCode, status: number, message: string, retryable = false) {
    super(message);
    this.name = 'ZScoreError';
    this.code = code;
    this.status = status;
    this.retryable = retryable;
  }

  toResponse(): ErrorResponse {
    return { error: this.code, message: this.message, retryable: this.retryable };
  }
}

export class InvalidRequest extends ZScoreError {
  constructor(message: string) {
    super('invalid_request', 400, message);
    this.name = 'InvalidRequest';
  }
}

export class CompanyNotFound extends ZScoreError {
  constructor(readonly identifier: string) {
    super('company_not_found', 404, `Company '${identifier}' not found. Provide a valid ticker symbol or company name.`);
    this.name = 'CompanyNotFound';
  }
}

export class FilingUnavailable extends ZScoreError {
  constructor(message: string) {
    super('filing_unavailable', 404, message);
    this.name = 'FilingUnavailable';
  }
}

export class QuoteUnavailable extends ZScoreError {
  constructor(readonly ticker: string, detail?: string) {
    super('quote_unavailable', 404, `Could not retrieve stock price data for ticker '${ticker}'${detail ? `: ${detail}` : ''}`);
    this.name = 'QuoteUnavailable';
  }
}

export class MissingLineItem extends ZScoreError {
  constructor(readonly field: string, readonly candidates: readonly string[]) {
    super('missing_line_item', 422, `Filing has no value for ${field} (tried ${candidates.join(', ')})`);
    this.name = 'MissingLineItem';
  }
}

export class MalformedFiling extends ZScoreError {
  constructor(message: string) {
    super('malformed_filing', 422, message);
    this.name = 'MalformedFiling';
  }
}

export class DivisionUndefined extends ZScoreError {
  constructor(message: string) {
    super('division_undefined', 422, message);
    this.name = 'DivisionUndefined';
  }
}

export class UpstreamUnavailable extends ZScoreError {
  constructor(readonly source: 'sec' | 'quotes', message: string) {
    super('upstream_unavailable', 503, message, true);
    this.name = 'UpstreamUnavailable';
  }
}

export const describeIssues = (error: ZodError): string =>
  error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
