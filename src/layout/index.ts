export {
  composeScorecard,
  serializeScene,
  computeOverallScore,
  scoredChecklist,
  formatPeriodHeading,
  toArtifactName,
  statusColor,
  DEFAULT_COMPOSE_OPTIONS,
} from './composeScorecard';
export { CANVAS_WIDTH, CANVAS_HEIGHT, DEFAULT_STATUS_PALETTE } from './constants';
export type {
  SceneGraph,
  SceneElement,
  TextElement,
  RectElement,
  BarElement,
  LogoElement,
  StatusPalette,
  ComposeOptions,
} from './types';
