import type { SeriesName } from '@/types';

export type RealReturnErrorCode =
  | 'EMPTY_RANGE'
  | 'INSUFFICIENT_LEAD_DATA'
  | 'EMPTY_SERIES'
  | 'MISALIGNED_SERIES'
  | 'DATA_UNAVAILABLE'
  | 'INVALID_WINDOW'
  | 'INVALID_AMOUNT';

interface ErrorContext {
  series?: SeriesName;
  /** ISO date or year-month the failure refers to */
  date?: string;
  cause?: unknown;
}

/**
 * Base class for every failure the calculation or its providers surface.
 * Carries enough context (series, date) for a user-facing message.
 */
export abstract class RealReturnError extends Error {
  abstract readonly code: RealReturnErrorCode;
  readonly series: SeriesName | undefined;
  readonly date: string | undefined;

  protected constructor(message: string, context: ErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = new.target.name;
    this.series = context.series;
    this.date = context.date;
  }
}

/** No points of a series fall inside the requested window */
export class EmptyRangeError extends RealReturnError {
  readonly code = 'EMPTY_RANGE';

  constructor(series: SeriesName, startDate: string, endDate: string) {
    super(`No ${series} data between ${startDate} and ${endDate}`, { series, date: startDate });
  }
}

/** Inflation data starts after the first price date, nothing to anchor to */
export class InsufficientLeadDataError extends RealReturnError {
  readonly code = 'INSUFFICIENT_LEAD_DATA';

  constructor(firstPriceDate: string, firstPeriod: string) {
    super(
      `First price date ${firstPriceDate} precedes the first available inflation period ${firstPeriod}`,
      { series: 'inflation', date: firstPriceDate }
    );
  }
}

export class EmptySeriesError extends RealReturnError {
  readonly code = 'EMPTY_SERIES';

  constructor(series: SeriesName) {
    super(`Cannot accumulate an empty ${series} series`, { series });
  }
}

export class MisalignedSeriesError extends RealReturnError {
  readonly code = 'MISALIGNED_SERIES';
  readonly index: number;

  constructor(index: number, nominalDate: string | undefined, inflationDate: string | undefined) {
    super(
      `Series diverge at index ${index}: nominal ${nominalDate ?? '<none>'}, inflation ${inflationDate ?? '<none>'}`,
      { date: nominalDate ?? inflationDate }
    );
    this.index = index;
  }
}

/** Provider failure (invalid ticker, outage, malformed payload) */
export class DataUnavailableError extends RealReturnError {
  readonly code = 'DATA_UNAVAILABLE';

  constructor(series: SeriesName, message: string, cause?: unknown) {
    super(message, { series, cause });
  }
}

export class InvalidWindowError extends RealReturnError {
  readonly code = 'INVALID_WINDOW';

  constructor(startDate: string, endDate: string) {
    super(`Invalid window: ${startDate} .. ${endDate}`, { date: startDate });
  }
}

export class InvalidAmountError extends RealReturnError {
  readonly code = 'INVALID_AMOUNT';

  constructor(amount: number) {
    super(`Initial amount must be a positive number, got ${amount}`);
  }
}

export function isRealReturnError(error: unknown): error is RealReturnError {
  return error instanceof RealReturnError;
}
