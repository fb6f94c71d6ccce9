import type { ErrorCode } from '../utils/AppError';
import type { MalformedOrderRow, RawRow, ScorecardRecord } from '../records/types';
import type { MatchResult } from '../matching/types';
import type { DailyBucket } from '../aggregation/types';
import type { SceneGraph } from '../layout/types';

export interface BatchItemError {
  code: ErrorCode;
  message: string;
}

interface OutcomeBase {
  /** Position of the scorecard row in the input */
  index: number;
  /** 1-based row number, as reported to the operator */
  rowNumber: number;
  /** The scorecard row exactly as it was handed in */
  input: RawRow;
}

export interface SuccessOutcome extends OutcomeBase {
  status: 'success';
  scorecard: ScorecardRecord;
  match: MatchResult;
  buckets: DailyBucket[];
  scene: SceneGraph;
  /** File name the rasterizer should write, e.g. "Jon_Smith.png" */
  artifactName: string;
  /** Order rows of the matched entity that were skipped as malformed */
  malformedOrders: MalformedOrderRow[];
}

export interface UnmatchedOutcome extends OutcomeBase {
  status: 'unmatched';
  scorecard: ScorecardRecord;
  match: MatchResult;
  /** Malformed order rows whose entity name normalizes to the scorecard's name */
  malformedOrders: MalformedOrderRow[];
}

export interface ErrorOutcome extends OutcomeBase {
  status: 'error';
  /** Present when the row parsed and the failure came later */
  scorecard?: ScorecardRecord;
  error: BatchItemError;
}

export type BatchOutcome = SuccessOutcome | UnmatchedOutcome | ErrorOutcome;

export interface BatchSummary {
  total: number;
  success: number;
  unmatched: number;
  error: number;
  /** Malformed order rows attached to at least one outcome */
  flaggedOrderRows: number;
  /** Every malformed order row of the batch, attached or not */
  malformedOrderRows: number;
}

/**
 * Rasterizer boundary: turns a scene into image bytes or rejects.
 */
export interface SceneRenderer {
  render(scene: SceneGraph, artifactName: string): Promise<Buffer>;
}

export type RenderedOutcome =
  | { status: 'rendered'; outcome: SuccessOutcome; image: Buffer }
  | { status: 'failed'; outcome: SuccessOutcome; error: BatchItemError }
  | {
      status: 'skipped';
      outcome: BatchOutcome;
      reason: 'unmatched' | 'error' | 'stopped';
    };

export interface RenderBatchOptions {
  /** Maximum renders in flight */
  concurrency: number;
  /** Checked before each submission; once true, remaining items are skipped */
  shouldStop: () => boolean;
}
