export type Bar = {
  readonly time: number;   // epoch ms, session open
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
};
export type BarSeries = readonly Bar[];

/** Missing statistic (warm-up not reached). Never NaN. */
export type MaybeNumber = number | undefined;

export type FetchBarsResult =
  | { ok: true; bars: BarSeries }
  | { ok: false; reason: 'DataUnavailable'; detail: string };

export type FetchBars = (ticker: string, lookbackDays: number) => Promise<FetchBarsResult>;

export interface IndicatorSnapshot {
  price: number;
  rsi: number;
  macd: number;
  signal: number;
  histogram: number;
  sma20: MaybeNumber;
  sma50: MaybeNumber;
  sma200: MaybeNumber;
  volume: number;
  avgVolume: MaybeNumber;
}

export type SnapshotResult =
  | { ok: true; snapshot: IndicatorSnapshot }
  | { ok: false; reason: 'InsufficientHistory'; bars: number };

export type CriterionId =
  | 'rsi_zone'
  | 'macd_histogram'
  | 'macd_above_signal'
  | 'price_above_sma20'
  | 'price_above_sma50';

export interface CriterionOutcome {
  id: CriterionId;
  passed: boolean;
  points: number;
  reason: string | null;
}

export interface ScreeningResult extends IndicatorSnapshot {
  ticker: string;
  score: number;
  reasons: string[];
}

export type FailureReason = 'DataUnavailable' | 'InsufficientHistory';

export interface ScanFailure {
  ticker: string;
  reason: FailureReason;
  detail: string;
}

export interface ScanReport {
  results: ScreeningResult[];
  failures: ScanFailure[];
  scannedAt: number;
  aborted: boolean;
  configHash: string;
}
