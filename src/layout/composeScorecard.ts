/**
 * Scorecard Layout
 *
 * Places one scorecard onto the fixed 1000x1200 canvas:
 * - header (0-240): logo, entity name, reporting week, period
 * - chart (240-960): one stacked bar per daily bucket, colored by status
 * - footer (960-1200): template checklist, overall score, legend, totals
 *
 * Every coordinate is a closed-form function of the canvas size and of how
 * many buckets, statuses and checklist fields there are. Same input, same
 * scene, down to the serialized bytes.
 */

import { dayOfWeek, monthName, weekOfMonth } from '../utils/dates';
import type { BrandingAsset } from '../types';
import type { ScorecardRecord, TemplateFieldValue } from '../records/types';
import type { DailyBucket } from '../aggregation/types';
import {
  BAR_FILL_RATIO,
  CANVAS_HEIGHT,
  CANVAS_WIDTH,
  CHART_BOTTOM,
  COLORS,
  DAY_NAMES,
  DEFAULT_STATUS_PALETTE,
  HEADER_BOTTOM,
  LOGO_HEIGHT,
  LOGO_MAX_WIDTH,
  MARGIN,
  MAX_BAR_WIDTH,
  PLOT_BASELINE,
  PLOT_LEFT,
  PLOT_RIGHT,
  PLOT_TOP,
  SCORE_GOOD_THRESHOLD,
  VALUE_LABEL_SPACE,
} from './constants';
import type {
  ComposeOptions,
  SceneElement,
  SceneGraph,
  StatusPalette,
  TextElement,
} from './types';

export const DEFAULT_COMPOSE_OPTIONS: ComposeOptions = {
  statusPalette: DEFAULT_STATUS_PALETTE,
  excludedSource: 'biteme',
};

const round2 = (value: number): number => Math.round(value * 100) / 100;

const text = (
  id: string,
  content: string,
  x: number,
  y: number,
  style: Partial<Pick<TextElement, 'fontSize' | 'fontWeight' | 'color' | 'align'>> = {}
): TextElement => ({
  kind: 'text',
  id,
  text: content,
  x: round2(x),
  y: round2(y),
  fontSize: style.fontSize ?? 16,
  fontWeight: style.fontWeight ?? 'normal',
  color: style.color ?? COLORS.text,
  align: style.align ?? 'start',
});

export function statusColor(status: string, palette: StatusPalette): string {
  return palette.colors[status] ?? palette.fallback;
}

/**
 * Checklist entries that feed the overall score: the listed fields when
 * `scoredFields` is given (anything but true is not done), otherwise every
 * boolean template field.
 */
export function scoredChecklist(
  templateFields: Readonly<Record<string, TemplateFieldValue>>,
  scoredFields?: readonly string[]
): Array<[string, boolean]> {
  if (scoredFields) {
    return scoredFields.map((field): [string, boolean] => [field, templateFields[field] === true]);
  }
  return Object.entries(templateFields).filter(
    (entry): entry is [string, boolean] => typeof entry[1] === 'boolean'
  );
}

/**
 * Percentage of checklist entries that are done, or null when there is
 * nothing to score. With `scoredFields` the denominator is the length of that
 * list, so a field left empty or marked "NA" lowers the score.
 *
 * @example
 * computeOverallScore({ instagram: true, facebook: false, note: 'x' }) // 50
 * computeOverallScore({ instagram: true, facebook: 'NA' }, ['instagram', 'facebook', 'website']) // 33
 */
export function computeOverallScore(
  templateFields: Readonly<Record<string, TemplateFieldValue>>,
  scoredFields?: readonly string[]
): number | null {
  const checklist = scoredChecklist(templateFields, scoredFields);
  if (checklist.length === 0) {
    return null;
  }
  const done = checklist.filter(([, value]) => value).length;
  return Math.round((done / checklist.length) * 100);
}

/**
 * "JANUARY 2024 - WEEK 1" for a period starting 2024-01-03.
 */
export function formatPeriodHeading(periodStart: string): string {
  const year = periodStart.slice(0, 4);
  return `${monthName(periodStart).toUpperCase()} ${year} - WEEK ${weekOfMonth(periodStart)}`;
}

/**
 * File name the rasterizer should give this scorecard's image.
 *
 * @example
 * toArtifactName('Jon Smith!') // "Jon_Smith.png"
 */
export function toArtifactName(displayName: string): string {
  const safe = displayName
    .replace(/[^\w\s-]/g, '')
    .trim()
    .replace(/\s+/g, '_');
  return `${safe || 'scorecard'}.png`;
}

function composeHeader(scorecard: ScorecardRecord, asset: BrandingAsset): SceneElement[] {
  const logoWidth = round2(Math.min(LOGO_MAX_WIDTH, LOGO_HEIGHT * asset.aspectRatio));

  return [
    {
      kind: 'logo',
      id: 'header.logo',
      assetId: asset.id,
      x: round2(CANVAS_WIDTH - MARGIN - logoWidth),
      y: MARGIN,
      width: logoWidth,
      height: LOGO_HEIGHT,
    },
    text('header.title', scorecard.displayName.toUpperCase(), MARGIN, 90, {
      fontSize: 40,
      fontWeight: 'bold',
    }),
    text('header.subtitle', formatPeriodHeading(scorecard.periodStart), MARGIN, 140, {
      fontSize: 24,
    }),
    text('header.period', `${scorecard.periodStart} to ${scorecard.periodEnd}`, MARGIN, 180, {
      fontSize: 20,
      color: COLORS.muted,
    }),
  ];
}

function composeChart(buckets: readonly DailyBucket[], options: ComposeOptions): SceneElement[] {
  const elements: SceneElement[] = [
    text(
      'chart.title',
      `Daily Orders (Excluding ${options.excludedSource})`,
      CANVAS_WIDTH / 2,
      280,
      { fontSize: 26, fontWeight: 'bold', align: 'middle' }
    ),
    {
      kind: 'rect',
      id: 'chart.baseline',
      x: PLOT_LEFT,
      y: PLOT_BASELINE,
      width: PLOT_RIGHT - PLOT_LEFT,
      height: 2,
      fill: COLORS.gridline,
    },
  ];

  if (buckets.length === 0) {
    elements.push(
      text(
        'chart.empty',
        'No orders in period',
        CANVAS_WIDTH / 2,
        (PLOT_TOP + PLOT_BASELINE) / 2,
        { fontSize: 22, color: COLORS.muted, align: 'middle' }
      )
    );
    return elements;
  }

  const slotWidth = (PLOT_RIGHT - PLOT_LEFT) / buckets.length;
  const barWidth = Math.min(MAX_BAR_WIDTH, slotWidth * BAR_FILL_RATIO);
  const maxBarHeight = PLOT_BASELINE - PLOT_TOP - VALUE_LABEL_SPACE;
  const maxTotal = Math.max(1, ...buckets.map((bucket) => bucket.total));

  buckets.forEach((bucket, index) => {
    const slotCenter = PLOT_LEFT + slotWidth * index + slotWidth / 2;
    const x = round2(slotCenter - barWidth / 2);
    let top = PLOT_BASELINE;

    for (const status of Object.keys(bucket.countByStatus).sort()) {
      const count = bucket.countByStatus[status];
      const height = (count / maxTotal) * maxBarHeight;
      top -= height;
      elements.push({
        kind: 'bar',
        id: `chart.bar.${bucket.date}.${status}`,
        date: bucket.date,
        status,
        count,
        x,
        y: round2(top),
        width: round2(barWidth),
        height: round2(height),
        fill: statusColor(status, options.statusPalette),
      });
    }

    if (bucket.total > 0) {
      elements.push(
        text(`chart.value.${bucket.date}`, String(bucket.total), slotCenter, top - 10, {
          fontSize: 18,
          fontWeight: 'bold',
          align: 'middle',
        })
      );
    }

    elements.push(
      text(
        `chart.label.${bucket.date}`,
        `${DAY_NAMES[dayOfWeek(bucket.date)]} ${bucket.date.slice(5)}`,
        slotCenter,
        PLOT_BASELINE + 30,
        { fontSize: 14, color: COLORS.muted, align: 'middle' }
      )
    );
  });

  return elements;
}

function composeFooter(
  scorecard: ScorecardRecord,
  buckets: readonly DailyBucket[],
  options: ComposeOptions
): SceneElement[] {
  const elements: SceneElement[] = [
    {
      kind: 'rect',
      id: 'footer.divider',
      x: MARGIN,
      y: CHART_BOTTOM,
      width: CANVAS_WIDTH - 2 * MARGIN,
      height: 1,
      fill: COLORS.gridline,
    },
  ];

  // Checklist of boolean template fields, left of the score
  const checklist = scoredChecklist(scorecard.templateFields, options.scoredFields);
  const checklistWidth = 720;
  checklist.forEach(([field, done], index) => {
    const cellWidth = checklistWidth / checklist.length;
    const center = MARGIN + cellWidth * index + cellWidth / 2;
    elements.push(
      text(`footer.check.${field}.label`, field, center, 990, {
        fontSize: 12,
        color: COLORS.muted,
        align: 'middle',
      }),
      text(`footer.check.${field}.mark`, done ? '✓' : '✗', center, 1020, {
        fontSize: 22,
        fontWeight: 'bold',
        color: done ? COLORS.good : COLORS.poor,
        align: 'middle',
      })
    );
  });

  const score = computeOverallScore(scorecard.templateFields, options.scoredFields);
  if (score !== null) {
    const right = CANVAS_WIDTH - MARGIN;
    elements.push(
      text('footer.score.label', 'Overall Score', right, 990, {
        fontSize: 14,
        color: COLORS.muted,
        align: 'end',
      }),
      text('footer.score.value', `${score}%`, right, 1040, {
        fontSize: 44,
        fontWeight: 'bold',
        color: score >= SCORE_GOOD_THRESHOLD ? COLORS.good : COLORS.poor,
        align: 'end',
      })
    );
  }

  // Legend: one swatch per status present in the chart
  const statuses = [
    ...new Set(buckets.flatMap((bucket) => Object.keys(bucket.countByStatus))),
  ].sort();
  const legendSpacing =
    statuses.length > 0 ? Math.min(200, (CANVAS_WIDTH - 2 * MARGIN) / statuses.length) : 0;
  statuses.forEach((status, index) => {
    const x = MARGIN + legendSpacing * index;
    elements.push(
      {
        kind: 'rect',
        id: `footer.legend.${status}.swatch`,
        x: round2(x),
        y: 1080,
        width: 24,
        height: 24,
        fill: statusColor(status, options.statusPalette),
      },
      text(`footer.legend.${status}.label`, status, x + 34, 1098, { fontSize: 16 })
    );
  });

  const totalOrders = buckets.reduce((sum, bucket) => sum + bucket.total, 0);
  const activeDays = buckets.filter((bucket) => bucket.total > 0).length;
  const plural = (count: number, noun: string): string =>
    `${count} ${noun}${count === 1 ? '' : 's'}`;
  elements.push(
    text(
      'footer.summary',
      `${plural(totalOrders, 'order')} across ${plural(activeDays, 'day')}`,
      MARGIN,
      1160,
      { fontSize: 14, color: COLORS.muted }
    )
  );

  return elements;
}

function freezeScene(scene: SceneGraph): SceneGraph {
  scene.elements.forEach((element) => Object.freeze(element));
  Object.freeze(scene.elements);
  return Object.freeze(scene);
}

/**
 * Lays out one scorecard. Pure and deterministic; the returned scene and its
 * elements are frozen.
 *
 * @example
 * const scene = composeScorecard(scorecard, buckets, { id: 'brand-logo', aspectRatio: 2.5 });
 * scene.canvasWidth // 1000
 */
export function composeScorecard(
  scorecard: ScorecardRecord,
  buckets: readonly DailyBucket[],
  brandingAsset: BrandingAsset,
  options: ComposeOptions = DEFAULT_COMPOSE_OPTIONS
): SceneGraph {
  const elements: SceneElement[] = [
    {
      kind: 'rect',
      id: 'background',
      x: 0,
      y: 0,
      width: CANVAS_WIDTH,
      height: CANVAS_HEIGHT,
      fill: COLORS.background,
    },
    ...composeHeader(scorecard, brandingAsset),
    {
      kind: 'rect',
      id: 'header.divider',
      x: MARGIN,
      y: HEADER_BOTTOM - 20,
      width: CANVAS_WIDTH - 2 * MARGIN,
      height: 1,
      fill: COLORS.gridline,
    },
    ...composeChart(buckets, options),
    ...composeFooter(scorecard, buckets, options),
  ];

  return freezeScene({
    canvasWidth: CANVAS_WIDTH,
    canvasHeight: CANVAS_HEIGHT,
    elements,
  });
}

/**
 * Stable JSON description of a scene, as handed to the rasterizer.
 */
export function serializeScene(scene: SceneGraph): string {
  return JSON.stringify(scene);
}

export default composeScorecard;
