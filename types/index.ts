// types/index.ts

// --- 1. Narratives ---
export type NarrativeGroup = 'core' | 'supplementary';
export type NarrativeGroupFilter = NarrativeGroup | 'all';

export interface INarrative {
  id: string; // Remote label, e.g. "Worker layoffs"
  displayName: string;
  description: string;
  group: NarrativeGroup;
}

// --- 2. Metric Series ---
export interface IMetricPoint {
  date: string; // YYYY-MM-DD
  intensityZ: number;
  intensityPercentile: number; // 0-100
  sentiment: number | null; // [-1, 1], null on days without items
  sentimentPercentile: number | null; // 0-100

  // Raw fields reported alongside the derived ones
  articleCount?: number;
  rollingMean?: number | null;
  rollingStd?: number | null;
}

export interface IMetricSeries {
  narrativeId: string;
  startDate: string;
  endDate: string;
  points: IMetricPoint[];
}

export type NumericField =
  | 'intensityZ'
  | 'intensityPercentile'
  | 'sentiment'
  | 'sentimentPercentile'
  | 'articleCount';

export type SeriesViolationKind =
  | 'DATE_ORDER'
  | 'DATE_GAP'
  | 'PERCENTILE_RANGE'
  | 'SENTIMENT_RANGE'
  | 'NON_FINITE';

export interface ISeriesViolation {
  kind: SeriesViolationKind;
  date: string;
  message: string;
}

// --- 3. Derived Metrics ---
export type HorizonMove =
  | { horizon: number; status: 'defined'; move: number; fromDate: string; toDate: string }
  | { horizon: number; status: 'undefined'; reason: 'TARGET_MISSING' | 'LOOKBACK_MISSING' | 'INVALID_HORIZON' };

export interface IHorizonAlert {
  horizon: number;
  move: number;
  absMove: number;
  threshold: number;
}

export interface IAlert extends IHorizonAlert {
  narrativeId: string;
  date: string;
}

export type EngineErrorKind = 'InsufficientData' | 'DateNotFound';

export interface IEngineError {
  kind: EngineErrorKind;
  message: string;
  required?: number;
  available?: number;
}

export type EngineResult<T> = { ok: true; value: T } | { ok: false; error: IEngineError };

// --- 4. Fetching ---
export type FailureKind =
  | 'NotFound'
  | 'OutOfRange'
  | 'ClientError'
  | 'AuthFailure'
  | 'Transient'
  | 'InvalidResponse'
  | 'Unexpected';

export interface IFetchFailure {
  kind: FailureKind;
  message: string;
  statusCode?: number;
}

export interface IMetricsRequest {
  narrativeId: string;
  startDate: string;
  endDate: string;
  window?: number; // Baseline window sent to the remote service
  percentileWindow?: number;
}

export interface IFetchSuccess {
  status: 'success';
  narrativeId: string;
  series: IMetricSeries;
  attempts: number;
  fromCache: boolean;
  violations: ISeriesViolation[];
}

export interface IFetchFailureOutcome {
  status: 'failure';
  narrativeId: string;
  error: IFetchFailure;
  attempts: number;
}

export type FetchOutcome = IFetchSuccess | IFetchFailureOutcome;

export interface IFetchHooks {
  // Called before every attempt after the first
  onAttempt?: (attempt: number, maxAttempts: number) => void;
}

// --- 5. Batch Analysis ---
export type AnalysisState = 'idle' | 'running' | 'completed' | 'cancelled' | 'failed';

export interface IDateRange {
  startDate: string;
  endDate: string;
}

export interface IAnalysisRequest extends IDateRange {
  narrativeIds: string[];
}

export interface IAnalysisProgress {
  completed: number;
  total: number;
  lastCompletedId: string | null;
  currentId: string | null;
  currentAttempt: number | null;
}

export interface IAnalysisSnapshot {
  runId: string | null;
  state: AnalysisState;
  request: IAnalysisRequest | null;
  progress: IAnalysisProgress;
  outcomes: Record<string, FetchOutcome>;
  startedAt: string | null;
  finishedAt: string | null;
  error: string | null;
}

export type OrchestratorErrorKind = 'AlreadyRunning' | 'NotRunning' | 'InvalidState';

export interface IOrchestratorError {
  kind: OrchestratorErrorKind;
  message: string;
}

// --- 6. Dashboard & Alert Scan ---
export interface INarrativeSnapshot {
  narrativeId: string;
  displayName: string;
  group: NarrativeGroup;
  requestedDate: string;
  date: string;
  usedLatestFallback: boolean;
  intensityZ: number;
  intensityPercentile: number;
  sentiment: number | null;
  sentimentPercentile: number | null;
  articleCount: number | null;
  moves: HorizonMove[];
  alerts: IHorizonAlert[];
}

export interface IScannedAlert extends IAlert {
  displayName: string;
  intensityZ: number;
  sentiment: number | null;
  articleCount: number | null;
}

export interface IAlertScanSummary {
  total: number;
  avgAbsMove: number | null;
  maxAbsMove: number | null;
  narratives: number;
  topNarratives: { narrativeId: string; count: number }[];
}

export interface IAlertScanReport {
  alerts: IScannedAlert[];
  summary: IAlertScanSummary;
  failures: IFetchFailureOutcome[];
}
