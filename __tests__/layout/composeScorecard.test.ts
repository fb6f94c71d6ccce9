/**
 * Tests for Scorecard Layout
 */

import {
  composeScorecard,
  computeOverallScore,
  formatPeriodHeading,
  serializeScene,
  toArtifactName,
} from '../../src/layout/composeScorecard';
import { enumerateDays } from '../../src/utils/dates';
import type { DailyBucket } from '../../src/aggregation/types';
import type { ScorecardRecord } from '../../src/records/types';
import type { SceneElement, SceneGraph } from '../../src/layout/types';

const asset = { id: 'brand-logo', aspectRatio: 2.5 };

const scorecard: ScorecardRecord = {
  displayName: 'Jon Smith',
  periodStart: '2024-01-01',
  periodEnd: '2024-01-07',
  templateFields: { instagram: true, facebook: false, notes: 'weekly' },
};

const buckets: DailyBucket[] = [
  { date: '2024-01-02', countByStatus: { completed: 3 }, total: 3 },
  { date: '2024-01-03', countByStatus: { completed: 1 }, total: 1 },
];

function findElement(scene: SceneGraph, id: string): SceneElement | undefined {
  return scene.elements.find((element) => element.id === id);
}

describe('composeScorecard', () => {
  describe('structure', () => {
    it('should place header, chart and footer elements in drawing order', () => {
      const scene = composeScorecard(scorecard, buckets, asset);

      expect(scene.canvasWidth).toBe(1000);
      expect(scene.canvasHeight).toBe(1200);
      expect(scene.elements.map((element) => element.id)).toEqual([
        'background',
        'header.logo',
        'header.title',
        'header.subtitle',
        'header.period',
        'header.divider',
        'chart.title',
        'chart.baseline',
        'chart.bar.2024-01-02.completed',
        'chart.value.2024-01-02',
        'chart.label.2024-01-02',
        'chart.bar.2024-01-03.completed',
        'chart.value.2024-01-03',
        'chart.label.2024-01-03',
        'footer.divider',
        'footer.check.instagram.label',
        'footer.check.instagram.mark',
        'footer.check.facebook.label',
        'footer.check.facebook.mark',
        'footer.score.label',
        'footer.score.value',
        'footer.legend.completed.swatch',
        'footer.legend.completed.label',
        'footer.summary',
      ]);
    });

    it('should fill the header', () => {
      const scene = composeScorecard(scorecard, buckets, asset);

      expect(findElement(scene, 'header.logo')).toEqual({
        kind: 'logo',
        id: 'header.logo',
        assetId: 'brand-logo',
        x: 760,
        y: 40,
        width: 200,
        height: 80,
      });
      expect(findElement(scene, 'header.title')).toMatchObject({ text: 'JON SMITH', x: 40, y: 90 });
      expect(findElement(scene, 'header.subtitle')).toMatchObject({
        text: 'JANUARY 2024 - WEEK 1',
      });
      expect(findElement(scene, 'header.period')).toMatchObject({
        text: '2024-01-01 to 2024-01-07',
      });
      expect(findElement(scene, 'chart.title')).toMatchObject({
        text: 'Daily Orders (Excluding biteme)',
        x: 500,
        align: 'middle',
      });
    });

    it('should cap the logo width for wide artwork', () => {
      const scene = composeScorecard(scorecard, buckets, { id: 'wide', aspectRatio: 10 });

      expect(findElement(scene, 'header.logo')).toMatchObject({ x: 660, width: 300 });
    });
  });

  describe('chart', () => {
    it('should scale bars to the busiest day', () => {
      const scene = composeScorecard(scorecard, buckets, asset);

      expect(findElement(scene, 'chart.bar.2024-01-02.completed')).toEqual({
        kind: 'bar',
        id: 'chart.bar.2024-01-02.completed',
        date: '2024-01-02',
        status: 'completed',
        count: 3,
        x: 230,
        y: 360,
        width: 120,
        height: 520,
        fill: '#4CAF50',
      });
      expect(findElement(scene, 'chart.bar.2024-01-03.completed')).toMatchObject({
        x: 650,
        y: 706.67,
        height: 173.33,
      });
    });

    it('should label each bar with its total and weekday', () => {
      const scene = composeScorecard(scorecard, buckets, asset);

      expect(findElement(scene, 'chart.value.2024-01-02')).toMatchObject({
        text: '3',
        x: 290,
        y: 350,
      });
      expect(findElement(scene, 'chart.value.2024-01-03')).toMatchObject({
        text: '1',
        x: 710,
        y: 696.67,
      });
      expect(findElement(scene, 'chart.label.2024-01-02')).toMatchObject({
        text: 'TUE 01-02',
        y: 910,
      });
      expect(findElement(scene, 'chart.label.2024-01-03')).toMatchObject({ text: 'WED 01-03' });
    });

    it('should stack statuses in name order', () => {
      const scene = composeScorecard(
        scorecard,
        [{ date: '2024-01-02', countByStatus: { pending: 1, completed: 1 }, total: 2 }],
        asset
      );

      expect(findElement(scene, 'chart.bar.2024-01-02.completed')).toMatchObject({
        y: 620,
        height: 260,
      });
      expect(findElement(scene, 'chart.bar.2024-01-02.pending')).toMatchObject({
        y: 360,
        height: 260,
        fill: '#FFB300',
      });
    });

    it('should color unknown statuses with the fallback', () => {
      const scene = composeScorecard(
        scorecard,
        [{ date: '2024-01-02', countByStatus: { refunded: 1 }, total: 1 }],
        asset
      );

      expect(findElement(scene, 'chart.bar.2024-01-02.refunded')).toMatchObject({
        fill: '#607D8B',
      });
    });

    it('should draw an empty chart when there are no buckets', () => {
      const scene = composeScorecard(scorecard, [], asset);

      expect(findElement(scene, 'chart.empty')).toMatchObject({
        text: 'No orders in period',
        x: 500,
        y: 600,
      });
      expect(scene.elements.some((element) => element.kind === 'bar')).toBe(false);
      expect(findElement(scene, 'footer.summary')).toMatchObject({
        text: '0 orders across 0 days',
      });
    });

    it('should draw no value label over an empty day', () => {
      const scene = composeScorecard(
        scorecard,
        [
          { date: '2024-01-01', countByStatus: {}, total: 0 },
          { date: '2024-01-02', countByStatus: { completed: 1 }, total: 1 },
        ],
        asset
      );

      expect(findElement(scene, 'chart.value.2024-01-01')).toBeUndefined();
      expect(findElement(scene, 'chart.label.2024-01-01')).toMatchObject({ text: 'MON 01-01' });
      expect(findElement(scene, 'footer.summary')).toMatchObject({
        text: '1 order across 1 day',
      });
    });

    it('should keep every element on the canvas for a full month', () => {
      const month = enumerateDays('2024-01-01', '2024-01-31').map((date) => ({
        date,
        countByStatus: { completed: 2, pending: 1 },
        total: 3,
      }));
      const scene = composeScorecard(scorecard, month, asset);

      for (const element of scene.elements) {
        expect(element.x).toBeGreaterThanOrEqual(0);
        expect(element.y).toBeGreaterThanOrEqual(0);
        if (element.kind === 'text') {
          expect(element.x).toBeLessThanOrEqual(1000);
          expect(element.y).toBeLessThanOrEqual(1200);
        } else {
          expect(element.x + element.width).toBeLessThanOrEqual(1000);
          expect(element.y + element.height).toBeLessThanOrEqual(1200);
        }
        if (element.kind === 'bar') {
          expect(element.x).toBeGreaterThanOrEqual(80);
          expect(element.x + element.width).toBeLessThanOrEqual(920);
        }
      }
    });
  });

  describe('footer', () => {
    it('should show the checklist and a good score', () => {
      const scene = composeScorecard(scorecard, buckets, asset);

      expect(findElement(scene, 'footer.check.instagram.mark')).toMatchObject({
        text: '✓',
        x: 220,
        color: '#4CAF50',
      });
      expect(findElement(scene, 'footer.check.facebook.mark')).toMatchObject({
        text: '✗',
        x: 580,
        color: '#E53935',
      });
      expect(findElement(scene, 'footer.score.value')).toMatchObject({
        text: '50%',
        x: 960,
        align: 'end',
        color: '#4CAF50',
      });
    });

    it('should show a poor score in red', () => {
      const scene = composeScorecard(
        { ...scorecard, templateFields: { a: true, b: false, c: false } },
        buckets,
        asset
      );

      expect(findElement(scene, 'footer.score.value')).toMatchObject({
        text: '33%',
        color: '#E53935',
      });
    });

    it('should show every scored field in the checklist', () => {
      const scene = composeScorecard(scorecard, buckets, asset, {
        statusPalette: { colors: {}, fallback: '#607D8B' },
        excludedSource: 'biteme',
        scoredFields: ['instagram', 'website'],
      });

      expect(findElement(scene, 'footer.check.website.mark')).toMatchObject({ text: '✗' });
      expect(findElement(scene, 'footer.check.facebook.mark')).toBeUndefined();
      expect(findElement(scene, 'footer.score.value')).toMatchObject({ text: '50%' });
    });

    it('should leave out the score without boolean fields', () => {
      const scene = composeScorecard({ ...scorecard, templateFields: {} }, buckets, asset);

      expect(findElement(scene, 'footer.score.value')).toBeUndefined();
    });

    it('should list one legend entry per charted status', () => {
      const scene = composeScorecard(scorecard, buckets, asset);

      expect(findElement(scene, 'footer.legend.completed.swatch')).toMatchObject({
        x: 40,
        y: 1080,
        fill: '#4CAF50',
      });
      expect(findElement(scene, 'footer.legend.completed.label')).toMatchObject({
        text: 'completed',
        x: 74,
      });
      expect(findElement(scene, 'footer.summary')).toMatchObject({
        text: '4 orders across 2 days',
      });
    });

    it('should use the palette it is given', () => {
      const scene = composeScorecard(scorecard, buckets, asset, {
        statusPalette: { colors: { completed: '#000000' }, fallback: '#111111' },
        excludedSource: 'partner',
      });

      expect(findElement(scene, 'chart.bar.2024-01-02.completed')).toMatchObject({
        fill: '#000000',
      });
      expect(findElement(scene, 'chart.title')).toMatchObject({
        text: 'Daily Orders (Excluding partner)',
      });
    });
  });

  describe('determinism', () => {
    it('should produce byte-identical scenes for the same input', () => {
      const first = serializeScene(composeScorecard(scorecard, buckets, asset));
      const second = serializeScene(composeScorecard(scorecard, buckets, asset));

      expect(first).toBe(second);
    });

    it('should return a frozen scene', () => {
      const scene = composeScorecard(scorecard, buckets, asset);

      expect(Object.isFrozen(scene)).toBe(true);
      expect(Object.isFrozen(scene.elements)).toBe(true);
      expect(Object.isFrozen(scene.elements[0])).toBe(true);
    });
  });
});

describe('computeOverallScore', () => {
  it('should round the share of true flags to a percentage', () => {
    expect(computeOverallScore({ a: true, b: true, c: false })).toBe(67);
  });

  it('should ignore non-boolean fields', () => {
    expect(computeOverallScore({ a: true, note: 'x', visits: 3, blank: null })).toBe(100);
  });

  it('should return null without boolean fields', () => {
    expect(computeOverallScore({})).toBeNull();
  });

  it('should divide by the scored fields and count NA or missing as not done', () => {
    expect(
      computeOverallScore({ instagram: true, facebook: 'NA' }, ['instagram', 'facebook', 'website'])
    ).toBe(33);
  });

  it('should return null for an empty list of scored fields', () => {
    expect(computeOverallScore({ instagram: true }, [])).toBeNull();
  });
});

describe('formatPeriodHeading', () => {
  it('should name month, year and week of month', () => {
    expect(formatPeriodHeading('2024-01-10')).toBe('JANUARY 2024 - WEEK 2');
  });
});

describe('toArtifactName', () => {
  it('should build a file-safe name', () => {
    expect(toArtifactName('Jon Smith!')).toBe('Jon_Smith.png');
    expect(toArtifactName('Flour & Fire 🔥')).toBe('Flour_Fire.png');
  });

  it('should fall back when nothing usable remains', () => {
    expect(toArtifactName('  ')).toBe('scorecard.png');
  });
});
