/**
 * Error classes for the Sheets client.
 * Every failure the client raises is a SheetsClientError subclass so callers can
 * tell a malformed range apart from an auth problem or an API rejection.
 */

import type { RangeRequest } from './sheets/types.js';

/**
 * Base error class for all client errors
 */
export class SheetsClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'SheetsClientError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Thrown when a column or row index falls outside what A1 notation can address
 */
export class OutOfRangeError extends SheetsClientError {
  public readonly axis: 'column' | 'row';
  public readonly value: number;

  constructor(axis: 'column' | 'row', value: number, message: string) {
    super(message);
    this.name = 'OutOfRangeError';
    this.axis = axis;
    this.value = value;
  }
}

/**
 * Thrown when the supplied coordinates match none of the A1 range shapes
 */
export class InvalidRangeShapeError extends SheetsClientError {
  public readonly request: RangeRequest;

  constructor(request: RangeRequest, message = 'The specified range is not valid') {
    super(`${message}: ${describeRequest(request)}`);
    this.name = 'InvalidRangeShapeError';
    this.request = { ...request };
  }
}

export class AuthenticationError extends SheetsClientError {
  public readonly meta: string;

  constructor(meta: string, options?: { cause?: unknown }) {
    super(`Could not authenticate properly. ${meta}${causeSuffix(options?.cause)}`, options);
    this.name = 'AuthenticationError';
    this.meta = meta;
  }
}

/**
 * Thrown when no usable token can be obtained for the requested scopes
 */
export class TokenError extends SheetsClientError {
  public readonly scopes: readonly string[];

  constructor(scopes: readonly string[], options?: { cause?: unknown }) {
    super(`Token does not have proper scope ${scopes.join(' ')}${causeSuffix(options?.cause)}`, options);
    this.name = 'TokenError';
    this.scopes = scopes;
  }
}

/**
 * Non-success answer from the Sheets API
 */
export class SheetsApiError extends SheetsClientError {
  public readonly status: number;
  public readonly body: string;

  constructor(status: number, body: string, message?: string, options?: { cause?: unknown }) {
    super(message ?? `Error from Google Sheets API. ${status} ${body}`, options);
    this.name = 'SheetsApiError';
    this.status = status;
    this.body = body;
  }
}

interface GaxiosLikeError {
  message: string;
  code?: unknown;
  response?: {
    status?: number;
    data?: unknown;
  };
}

function isGaxiosLikeError(error: unknown): error is GaxiosLikeError {
  return error instanceof Error && ('response' in error || 'code' in error);
}

/**
 * Map a googleapis failure onto SheetsApiError.
 * Status comes from the HTTP response, falling back to a numeric `code`, then 500.
 */
export function toSheetsApiError(error: unknown): SheetsApiError {
  if (error instanceof SheetsApiError) {
    return error;
  }

  if (!isGaxiosLikeError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return new SheetsApiError(500, message, undefined, { cause: error });
  }

  const numericCode = typeof error.code === 'number' ? error.code : Number(error.code);
  const status = error.response?.status ?? (Number.isInteger(numericCode) ? numericCode : 500);
  const data = error.response?.data;
  const body = data === undefined
    ? error.message
    : typeof data === 'string' ? data : JSON.stringify(data);

  return new SheetsApiError(status, body, describeStatus(status, error.message), { cause: error });
}

function describeStatus(status: number, message: string): string {
  switch (status) {
    case 401:
      return 'Access token expired or invalid. Re-authenticate and try again.';
    case 403:
      // Sheets reports per-user quota exhaustion as 403 as well
      if (/rate|quota|limit/i.test(message)) {
        return 'Sheets API rate limit exceeded. Please wait and try again.';
      }
      return 'Sheets access not authorized for this token. Re-authenticate to grant Sheets permissions.';
    case 404:
      return 'Spreadsheet not found or you do not have permission to access it.';
    default:
      return `Error from Google Sheets API. ${status} ${message}`;
  }
}

function describeRequest(request: RangeRequest): string {
  const show = (value: number | undefined) => value === undefined ? '-' : String(value);
  return `(startColumn=${show(request.startColumn)}, startRow=${show(request.startRow)}, ` +
    `endColumn=${show(request.endColumn)}, endRow=${show(request.endRow)})`;
}

function causeSuffix(cause: unknown): string {
  if (cause instanceof Error) {
    return `: ${cause.message}`;
  }
  return '';
}
