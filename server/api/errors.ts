/**
 * Mapping from error kinds to HTTP responses
 */

import type { Response } from 'express';
import type { ApiError, BenchError, ErrorKind } from '../../shared/types.js';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  ConfigError: 400,
  UnknownFunction: 400,
  UnsupportedRange: 400,
  UnsupportedFormat: 400,
  NoData: 404,
  NoDevicesConfigured: 409,
  ConnectionError: 502,
  QueryIOFailure: 502,
  ParseError: 502,
  QueryTimeout: 504,
  IOFailure: 500,
};

export function sendError(res: Response, status: number, error: string, message: string): void {
  const body: ApiError = { error, message };
  res.status(status).json(body);
}

export function sendBenchError(res: Response, err: BenchError): void {
  sendError(res, STATUS_BY_KIND[err.kind], err.kind, err.message);
}

/** Query-string value as a single string */
export function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}
