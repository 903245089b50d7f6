/** ISO calendar date, `YYYY-MM-DD` */
export type IsoDate = string;

/** Calendar month, `YYYY-MM` */
export type YearMonth = string;

export type SeriesName = 'prices' | 'inflation';

/** Daily adjusted close delivered by the stock price provider */
export interface PricePoint {
  date: IsoDate;
  /** Dividend/split adjusted close; null when the provider has no quote for the day */
  adjustedClose: number | null;
}

/** IPCA index level at the close of a month */
export interface InflationPoint {
  period: YearMonth;
  indexValue: number;
}

export interface NormalizedPoint {
  readonly date: IsoDate;
  readonly value: number;
}

/** Strictly increasing dates, no duplicates, no gaps */
export type NormalizedSeries = readonly NormalizedPoint[];

export interface GrowthFactorPoint {
  readonly date: IsoDate;
  readonly factor: number;
}

/** Cumulative growth since the first date; factor[0] is always 1 */
export type GrowthFactorSeries = readonly GrowthFactorPoint[];

export type NormalizationWarningKind = 'DROPPED_POINT' | 'DUPLICATE_DATE';

export interface NormalizationWarning {
  readonly kind: NormalizationWarningKind;
  readonly series: SeriesName;
  /** ISO date for prices, year-month for inflation */
  readonly date: string;
  readonly reason: string;
}

export interface NormalizedPair {
  readonly prices: NormalizedSeries;
  readonly inflation: NormalizedSeries;
  readonly warnings: readonly NormalizationWarning[];
}

export type RealReturnOutcome = 'REAL_GAIN' | 'REAL_LOSS' | 'BREAK_EVEN';

export interface RealReturnResult {
  readonly startDate: IsoDate;
  readonly endDate: IsoDate;
  readonly nominalSeries: GrowthFactorSeries;
  readonly inflationSeries: GrowthFactorSeries;
  readonly realSeries: GrowthFactorSeries;
  readonly totalNominalPct: number;
  readonly totalInflationPct: number;
  /** Always (realSeries.last.factor - 1) * 100 */
  readonly totalRealPct: number;
  /** Nominal % minus inflation %, the subtraction shortcut */
  readonly naiveRealPct: number;
  readonly outcome: RealReturnOutcome;
  readonly warnings: readonly NormalizationWarning[];
}

/** Money view of a result for a given initial investment */
export interface InvestmentProjection {
  initialAmount: number;
  /** Nominal value at the end date */
  finalAmount: number;
  /** Initial amount corrected by IPCA, the real break-even */
  inflationAdjustedAmount: number;
  /** Final value in start-date purchasing power */
  realAmount: number;
  realGainAmount: number;
}

/** Query accepted by GET /api/real-return */
export interface RealReturnQuery {
  ticker: string;
  start: IsoDate;
  end: IsoDate;
  amount: number;
}

export interface RealReturnResponse {
  /** Provider symbol actually queried, e.g. PETR4.SA */
  ticker: string;
  result: RealReturnResult;
  projection: InvestmentProjection;
}

export interface InflationResponse {
  points: InflationPoint[];
}

export interface ApiErrorBody {
  error: string;
  code: string;
  series?: SeriesName;
  date?: string;
}
