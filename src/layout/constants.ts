import type { StatusPalette } from './types';

export const CANVAS_WIDTH = 1000;
export const CANVAS_HEIGHT = 1200;
export const MARGIN = 40;

// Region bands (y ranges)
export const HEADER_BOTTOM = 240;
export const CHART_BOTTOM = 960;

// Plot area inside the chart band
export const PLOT_LEFT = 80;
export const PLOT_RIGHT = 920;
export const PLOT_TOP = 320;
export const PLOT_BASELINE = 880;
/** Room kept above the tallest bar for its value label */
export const VALUE_LABEL_SPACE = 40;
export const MAX_BAR_WIDTH = 120;
export const BAR_FILL_RATIO = 0.6;

export const LOGO_HEIGHT = 80;
export const LOGO_MAX_WIDTH = 300;

export const COLORS = {
  background: '#FFFFFF',
  text: '#212121',
  muted: '#757575',
  gridline: '#CCCCCC',
  good: '#4CAF50',
  poor: '#E53935',
} as const;

/** Overall score at or above this percentage is shown in the "good" color */
export const SCORE_GOOD_THRESHOLD = 50;

export const DEFAULT_STATUS_PALETTE: StatusPalette = {
  colors: {
    completed: '#4CAF50',
    pending: '#FFB300',
    cancelled: '#9E9E9E',
  },
  fallback: '#607D8B',
};

export const DAY_NAMES = ['SUN', 'MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT'] as const;
