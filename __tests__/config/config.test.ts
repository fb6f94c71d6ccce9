import { env, loadEnv, resolveBatchConfig } from '../../src/config';
import { buildBatchConfig, DEFAULT_BRANDING_ASSET } from '../../src/config/batchConfig';
import { AppError } from '../../src/utils/AppError';
import { DEFAULT_STATUS_PALETTE } from '../../src/layout/constants';
import { DEFAULT_SIMILARITY_WEIGHTS } from '../../src/matching/constants';

const envDefaults = { MATCH_THRESHOLD: 0.8, EXCLUDED_SOURCE: 'biteme', DENSE_CALENDAR: false };

describe('loadEnv', () => {
  it('should apply defaults', () => {
    expect(loadEnv({})).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      MATCH_THRESHOLD: 0.8,
      EXCLUDED_SOURCE: 'biteme',
      RENDER_CONCURRENCY: 2,
      DENSE_CALENDAR: false,
    });
  });

  it('should coerce values from text', () => {
    const loaded = loadEnv({
      MATCH_THRESHOLD: '0.75',
      RENDER_CONCURRENCY: '4',
      DENSE_CALENDAR: '1',
      EXCLUDED_SOURCE: ' partner ',
    });

    expect(loaded.MATCH_THRESHOLD).toBe(0.75);
    expect(loaded.RENDER_CONCURRENCY).toBe(4);
    expect(loaded.DENSE_CALENDAR).toBe(true);
    expect(loaded.EXCLUDED_SOURCE).toBe('partner');
  });

  it('should list every invalid key', () => {
    expect(() => loadEnv({ MATCH_THRESHOLD: '2', RENDER_CONCURRENCY: '0' })).toThrow(
      /^Invalid environment configuration: MATCH_THRESHOLD: .+; RENDER_CONCURRENCY: .+$/
    );
  });

  it('should read the test environment set up for the suite', () => {
    expect(env.NODE_ENV).toBe('test');
    expect(env.LOG_LEVEL).toBe('error');
  });
});

describe('buildBatchConfig', () => {
  it('should fill defaults from the environment and built-in tables', () => {
    const config = buildBatchConfig({}, envDefaults);

    expect(config).toEqual({
      matchThreshold: 0.8,
      excludedSource: 'biteme',
      nameAliases: {},
      statusPalette: DEFAULT_STATUS_PALETTE,
      denseCalendar: false,
      brandingAsset: DEFAULT_BRANDING_ASSET,
      honorifics: expect.arrayContaining(['mr', 'dr', 'jr']),
      punctuation: expect.stringContaining(','),
      similarity: DEFAULT_SIMILARITY_WEIGHTS,
    });
  });

  it('should let overrides win', () => {
    const config = buildBatchConfig(
      { matchThreshold: 0.9, nameAliases: { 'JS Catering': 'Jon Smith' } },
      envDefaults
    );

    expect(config.matchThreshold).toBe(0.9);
    expect(config.nameAliases).toEqual({ 'JS Catering': 'Jon Smith' });
  });

  it('should reject a threshold outside [0, 1]', () => {
    expect(() => buildBatchConfig({ matchThreshold: 1.5 }, envDefaults)).toThrow(AppError);
    expect(() => buildBatchConfig({ matchThreshold: -0.1 }, envDefaults)).toThrow(
      /^Invalid batch configuration: matchThreshold: /
    );
  });

  it('should reject malformed palette colors', () => {
    expect(() =>
      buildBatchConfig(
        { statusPalette: { colors: { completed: 'green' }, fallback: '#607D8B' } },
        envDefaults
      )
    ).toThrow('Invalid batch configuration: statusPalette.colors.completed: Expected a #RRGGBB color');
  });

  it('should reject similarity weights that do not add up to 1', () => {
    try {
      buildBatchConfig(
        { similarity: { tokenWeight: 0.5, editWeight: 0.4, tokenMatchFloor: 0.7 } },
        envDefaults
      );
      throw new Error('expected buildBatchConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({
        code: 'INVALID_CONFIG',
        message:
          'Invalid batch configuration: similarity: tokenWeight and editWeight must add up to 1',
      });
    }
  });
});

describe('resolveBatchConfig', () => {
  it('should use the process environment as defaults', () => {
    const config = resolveBatchConfig({ denseCalendar: true });

    expect(config.matchThreshold).toBe(env.MATCH_THRESHOLD);
    expect(config.excludedSource).toBe(env.EXCLUDED_SOURCE);
    expect(config.denseCalendar).toBe(true);
  });
});
