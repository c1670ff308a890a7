export type {
  ActionBand,
  ActionBandsConfig,
  ArchiveEntry,
  InstrumentMeta,
  Manifest,
  ManifestItem,
  MetadataDocument,
  MetricsSnapshot,
  PipelineConfig,
  PriceBar,
  PriceStoreDocument,
  RecommendationAction,
  ConfidenceLevel,
  RecommendationRecord,
  RecommendationSet,
  RefinementEntry,
  RefinementLayer,
  SelectionArtifact,
  SelectionPick,
  SessionWindow,
  StoredPrice
} from './schema';

export type ExecutionMode = 'AFTERNOON_REFRESH' | 'EVENING_SELECT' | 'IDLE';

export interface ExecutionWindow {
  referenceDate: string; // YYYY-MM-DD in the market timezone
  mode: ExecutionMode;
  windowStart: string | null; // ISO instant, null when IDLE
  windowEnd: string | null;
}

export type HolidayClass = 'TRADING' | 'HOLIDAY' | 'SPECIAL_CLOSURE';

export interface TradingDayRecord {
  date: string;
  isTradingDay: boolean;
  holidayClass: HolidayClass;
}

export type RunStatus = 'SUCCESS' | 'PARTIAL' | 'ABORTED';

export type StepName =
  | 'verify-window'
  | 'fetch-metadata'
  | 'fetch-prices'
  | 'backup-verify'
  | 'score-select'
  | 'archive-write'
  | 'publish-manifest';

export const STEP_ORDER: StepName[] = [
  'verify-window',
  'fetch-metadata',
  'fetch-prices',
  'backup-verify',
  'score-select',
  'archive-write',
  'publish-manifest'
];

// Steps from backup-verify onward mutate state that cannot be recovered.
export const DESTRUCTIVE_TAIL: StepName[] = ['backup-verify', 'score-select', 'archive-write', 'publish-manifest'];

export type StepStatus = 'OK' | 'DEGRADED' | 'FAILED' | 'DENIED' | 'SKIPPED' | 'NOT_RUN';

export interface StepIssue {
  code: string;
  message: string;
  instrumentId?: string;
}

export interface StepResult {
  step: StepName;
  status: StepStatus;
  startedAt?: string;
  finishedAt?: string;
  detail?: Record<string, unknown>;
  issues: StepIssue[];
}

export interface RunReport {
  runId: string;
  mode: ExecutionMode;
  referenceDate: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  steps: StepResult[];
}

export interface RankedCandidate {
  instrumentId: string;
  score: number;
  category: string;
  rationale: string;
  confidence?: 'high' | 'medium' | 'low';
}

export type LedgerEventType =
  | 'RUN_STARTED'
  | 'RUN_DENIED'
  | 'STEP_COMPLETED'
  | 'STEP_DEGRADED'
  | 'STEP_FAILED'
  | 'RUN_COMPLETED'
  | 'RUN_PARTIAL'
  | 'RUN_ABORTED'
  | 'RECONCILE_REPORTED'
  | 'RECONCILE_APPLIED'
  | 'REFINEMENT_MERGED';

export interface LedgerEvent {
  id: string;
  runId: string;
  timestamp: string;
  type: LedgerEventType;
  details?: Record<string, unknown>;
}
