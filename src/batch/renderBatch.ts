/**
 * Render fan-out
 *
 * Hands composed scenes to the rasterizer with bounded concurrency. Results
 * come back in input order whatever order the renders finish in, and one
 * failed render never affects another.
 */

import { env } from '../config';
import { logger } from '../utils';
import { AppError } from '../utils/AppError';
import type { BatchOutcome, RenderBatchOptions, RenderedOutcome, SceneRenderer } from './types';

const DEFAULT_RENDER_OPTIONS: RenderBatchOptions = {
  concurrency: env.RENDER_CONCURRENCY,
  shouldStop: () => false,
};

async function renderOne(
  outcome: BatchOutcome,
  renderer: SceneRenderer,
  stopped: boolean
): Promise<RenderedOutcome> {
  if (outcome.status !== 'success') {
    return { status: 'skipped', outcome, reason: outcome.status };
  }
  if (stopped) {
    return { status: 'skipped', outcome, reason: 'stopped' };
  }

  try {
    const image = await renderer.render(outcome.scene, outcome.artifactName);
    logger.debug(`[row ${outcome.rowNumber}] Rendered ${outcome.artifactName}`);
    return { status: 'rendered', outcome, image };
  } catch (error) {
    const failure = AppError.from(error, 'RENDER_ERROR');
    logger.error(`[row ${outcome.rowNumber}] Render of ${outcome.artifactName} failed: ${failure.message}`);
    return {
      status: 'failed',
      outcome,
      error: { code: failure.code, message: failure.message },
    };
  }
}

/**
 * Renders every successful outcome of a batch.
 *
 * Non-success outcomes are passed through as skipped. Once `shouldStop`
 * returns true no new render is started; renders already in flight finish
 * and everything not yet started is reported as skipped with reason "stopped".
 * Rejects with an INVALID_CONFIG AppError when `concurrency` is not finite;
 * values below 1 run one render at a time.
 *
 * @example
 * const rendered = await renderBatch(runBatch(scorecards, orders, config), renderer, {
 *   concurrency: 4,
 * });
 */
export async function renderBatch(
  outcomes: readonly BatchOutcome[],
  renderer: SceneRenderer,
  options: Partial<RenderBatchOptions> = {}
): Promise<RenderedOutcome[]> {
  const { concurrency, shouldStop } = { ...DEFAULT_RENDER_OPTIONS, ...options };
  if (!Number.isFinite(concurrency)) {
    throw AppError.invalidConfig(`Render concurrency must be a finite number, got ${concurrency}`);
  }
  const workerCount = Math.max(1, Math.min(Math.floor(concurrency), outcomes.length));

  const results = new Array<RenderedOutcome>(outcomes.length);
  let next = 0;
  let stopped = false;

  const work = async (): Promise<void> => {
    while (next < outcomes.length) {
      const position = next++;
      if (!stopped && shouldStop()) {
        stopped = true;
        logger.warn(`Render stopped before row ${outcomes[position].rowNumber}`);
      }
      results[position] = await renderOne(outcomes[position], renderer, stopped);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => work()));

  const rendered = results.filter((result) => result.status === 'rendered').length;
  const failed = results.filter((result) => result.status === 'failed').length;
  logger.info(
    `Render complete: ${rendered} rendered, ${failed} failed, ${results.length - rendered - failed} skipped`
  );

  return results;
}

export default renderBatch;
