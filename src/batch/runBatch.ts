/**
 * Scorecard Batch Coordinator
 *
 * Drives one batch from raw rows to composed scenes:
 * 1. VALIDATE - every order and scorecard row, bad rows become flagged items
 * 2. LINK - candidate grouping is built once and shared read-only
 * 3. AGGREGATE + COMPOSE - per matched scorecard
 *
 * Always returns one outcome per scorecard row, in input order. Nothing
 * thrown while handling one scorecard escapes the batch.
 */

import { logger, Logging } from '../utils';
import { AppError } from '../utils/AppError';
import { parseOrderRow, parseScorecardRow } from '../records/parseRecords';
import { buildCandidateIndex, linkScorecard } from '../matching/linkRecords';
import { normalizeName } from '../matching/normalizeName';
import { aggregateOrders, fillCalendar } from '../aggregation/aggregateOrders';
import { composeScorecard, toArtifactName } from '../layout/composeScorecard';
import type { BatchConfig } from '../types';
import type { MalformedOrderRow, OrderRecord, RawRow, ScorecardRecord } from '../records/types';
import type { CandidateIndex, MatchResult } from '../matching/types';
import type { BatchOutcome, BatchSummary } from './types';

// ============================================
// Helper Functions
// ============================================

interface ParsedOrders {
  orders: OrderRecord[];
  /** Normalized entity name -> malformed rows carrying that name */
  malformedByEntity: Map<string, MalformedOrderRow[]>;
  malformedCount: number;
}

function parseOrders(rows: readonly RawRow[], config: BatchConfig): ParsedOrders {
  const orders: OrderRecord[] = [];
  const malformedByEntity = new Map<string, MalformedOrderRow[]>();
  let malformedCount = 0;

  rows.forEach((row, index) => {
    const result = parseOrderRow(row, index + 1);
    if (result.success) {
      orders.push(result.data);
      return;
    }

    malformedCount++;
    logger.warn(`Order row ${result.rowNumber} skipped: ${result.error}`);

    const key = normalizeName(result.entityName, config);
    if (!key || result.entityName === undefined) return;

    const flagged: MalformedOrderRow = {
      rowNumber: result.rowNumber,
      entityName: result.entityName,
      error: result.error,
    };
    const existing = malformedByEntity.get(key);
    if (existing) {
      existing.push(flagged);
    } else {
      malformedByEntity.set(key, [flagged]);
    }
  });

  return { orders, malformedByEntity, malformedCount };
}

/**
 * Aggregates and composes one matched scorecard.
 */
function composeMatched(
  scorecard: ScorecardRecord,
  match: MatchResult,
  index: CandidateIndex,
  config: BatchConfig
) {
  const entityKey = match.matchedNormalizedName ?? '';
  const entityOrders = index.byName.get(entityKey)?.orders ?? [];

  const sparse = aggregateOrders(
    entityOrders,
    scorecard.periodStart,
    scorecard.periodEnd,
    config.excludedSource
  );
  const buckets = config.denseCalendar
    ? fillCalendar(sparse, scorecard.periodStart, scorecard.periodEnd)
    : sparse;

  const scene = composeScorecard(scorecard, buckets, config.brandingAsset, {
    statusPalette: config.statusPalette,
    excludedSource: config.excludedSource,
    scoredFields: config.scoredFields,
  });

  return { entityKey, buckets, scene };
}

// ============================================
// Main Batch Function
// ============================================

/**
 * Links, aggregates and composes every scorecard of a batch.
 *
 * @param scorecardRows - Scorecard sheet rows (display_name, period_start, period_end, template columns)
 * @param orderRows - Order export rows (entity_name, order_date, status, source)
 * @param config - Resolved batch config (see resolveBatchConfig)
 * @returns One outcome per scorecard row, in input order
 */
export function runBatch(
  scorecardRows: readonly RawRow[],
  orderRows: readonly RawRow[],
  config: BatchConfig
): BatchOutcome[] {
  const startTime = Date.now();

  const { orders, malformedByEntity, malformedCount } = parseOrders(orderRows, config);
  const index = buildCandidateIndex(orders, config);

  logger.info(
    `Batch started: ${scorecardRows.length} scorecards, ${orders.length} orders ` +
      `(${malformedCount} malformed), ${index.candidates.length} order entities`
  );

  const outcomes = scorecardRows.map((input, position): BatchOutcome => {
    const rowNumber = position + 1;
    let scorecard: ScorecardRecord | undefined;

    try {
      const parsed = parseScorecardRow(input, rowNumber);

      if (!parsed.success) {
        logger.warn(`Scorecard row ${rowNumber} is malformed: ${parsed.error}`);
        return {
          status: 'error',
          index: position,
          rowNumber,
          input,
          error: { code: 'MALFORMED_RECORD', message: parsed.error },
        };
      }

      scorecard = parsed.data;
      const match = linkScorecard(scorecard, index, config);

      if (!match.matched) {
        logger.debug(`[row ${rowNumber}] "${scorecard.displayName}" unmatched: ${match.explanation}`);
        return {
          status: 'unmatched',
          index: position,
          rowNumber,
          input,
          scorecard,
          match,
          malformedOrders: malformedByEntity.get(match.normalizedName) ?? [],
        };
      }

      const { entityKey, buckets, scene } = composeMatched(scorecard, match, index, config);
      logger.debug(`[row ${rowNumber}] "${scorecard.displayName}": ${match.explanation}`);
      return {
        status: 'success',
        index: position,
        rowNumber,
        input,
        scorecard,
        match,
        buckets,
        scene,
        artifactName: toArtifactName(scorecard.displayName),
        malformedOrders: malformedByEntity.get(entityKey) ?? [],
      };
    } catch (error) {
      // Before the row parsed, any failure is the row's own fault
      const failure = AppError.from(error, scorecard ? 'RENDER_ERROR' : 'MALFORMED_RECORD');
      logger.error(`[row ${rowNumber}] Scorecard failed: ${failure.message}`);
      return {
        status: 'error',
        index: position,
        rowNumber,
        input,
        scorecard,
        error: { code: failure.code, message: failure.message },
      };
    }
  });

  const summary = summarizeBatch(outcomes, malformedCount);
  if (summary.malformedOrderRows > summary.flaggedOrderRows) {
    logger.warn(
      `${summary.malformedOrderRows - summary.flaggedOrderRows} malformed order rows ` +
        `belong to no scorecard in this batch`
    );
  }
  logger.info(
    `Batch complete in ${Date.now() - startTime}ms: ${summary.success} composed, ` +
      `${summary.unmatched} unmatched, ${summary.error} failed`
  );
  Logging.debug(summary);

  return outcomes;
}

/**
 * Counts outcomes by status.
 *
 * A malformed order row attached to several outcomes is counted once in
 * `flaggedOrderRows`. `malformedOrderRows` is the batch-wide total when the
 * caller knows it (runBatch does), otherwise the flagged count.
 */
export function summarizeBatch(
  outcomes: readonly BatchOutcome[],
  malformedOrderRows?: number
): BatchSummary {
  const flagged = new Set<number>();
  const summary: BatchSummary = {
    total: outcomes.length,
    success: 0,
    unmatched: 0,
    error: 0,
    flaggedOrderRows: 0,
    malformedOrderRows: 0,
  };

  for (const outcome of outcomes) {
    summary[outcome.status]++;
    if (outcome.status !== 'error') {
      outcome.malformedOrders.forEach((row) => flagged.add(row.rowNumber));
    }
  }

  summary.flaggedOrderRows = flagged.size;
  summary.malformedOrderRows = malformedOrderRows ?? flagged.size;
  return summary;
}

export default runBatch;
