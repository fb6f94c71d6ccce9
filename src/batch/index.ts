export { runBatch, summarizeBatch } from './runBatch';
export { renderBatch } from './renderBatch';
export type {
  BatchItemError,
  BatchOutcome,
  BatchSummary,
  ErrorOutcome,
  RenderBatchOptions,
  RenderedOutcome,
  SceneRenderer,
  SuccessOutcome,
  UnmatchedOutcome,
} from './types';
