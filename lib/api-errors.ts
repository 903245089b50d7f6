import { NextResponse } from 'next/server';
import type { ApiErrorBody } from '@/types';
import { isRealReturnError, type RealReturnErrorCode } from './errors';
import logger from './logger';

const STATUS_BY_CODE: Record<RealReturnErrorCode, number> = {
  INVALID_WINDOW: 400,
  INVALID_AMOUNT: 400,
  EMPTY_RANGE: 404,
  INSUFFICIENT_LEAD_DATA: 422,
  DATA_UNAVAILABLE: 502,
  // Internal invariant violations
  EMPTY_SERIES: 500,
  MISALIGNED_SERIES: 500,
};

export function badRequest(message: string): Response {
  const body: ApiErrorBody = { error: message, code: 'INVALID_REQUEST' };
  return NextResponse.json(body, { status: 400 });
}

/**
 * JSON error response for anything thrown while serving a request.
 * Known errors keep their message and context; anything else is logged and
 * answered with a generic 500.
 */
export function errorResponse(error: unknown, context: Record<string, unknown>): Response {
  if (isRealReturnError(error)) {
    const status = STATUS_BY_CODE[error.code];
    const details = { ...context, code: error.code, series: error.series, date: error.date, error };
    if (status >= 500) {
      logger.error(details, error.message);
    } else {
      logger.warn(details, error.message);
    }

    const body: ApiErrorBody = { error: error.message, code: error.code };
    if (error.series) body.series = error.series;
    if (error.date) body.date = error.date;
    return NextResponse.json(body, { status });
  }

  logger.error({ ...context, error }, 'Unexpected error while handling request');
  const body: ApiErrorBody = { error: 'Internal server error', code: 'INTERNAL_ERROR' };
  return NextResponse.json(body, { status: 500 });
}
