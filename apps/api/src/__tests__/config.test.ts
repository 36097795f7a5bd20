import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_ENGINE_CONFIG, configEnvName, configFromEnv, resolveConfig } from '../config';
import { ConfigError, EngineError, ErrorCode, ShapeError, toEngineError } from '../utils/errors';
import { Logger } from '../utils/logger';

describe('resolveConfig', () => {
  it('applies overrides without touching the defaults', () => {
    const config = resolveConfig({ keys: { maxMissingRatio: 0.1 }, unknown: { anything: true } });
    expect(config.keys.maxMissingRatio).toBe(0.1);
    expect(DEFAULT_ENGINE_CONFIG.keys.maxMissingRatio).toBe(0.05);
  });

  it('rejects out-of-range and mistyped values', () => {
    expect(() => resolveConfig({ keys: { maxMissingRatio: 2 } })).toThrow(ConfigError);
    expect(() => resolveConfig({ keys: { minRows: '3' } })).toThrow(/keys.minRows must be a number/);
    expect(() => resolveConfig({ keys: { minRows: 1.5 } })).toThrow(/non-negative integer/);
    expect(() => resolveConfig('strict')).toThrow(/must be an object/);
  });

  it('lower-cases missing tokens', () => {
    const config = resolveConfig({ cleaning: { missingTokens: ['N/A', ' - '] } });
    expect(config.cleaning.missingTokens).toEqual(['n/a', '-']);
  });
});

describe('configFromEnv', () => {
  it('maps setting paths to environment variables', () => {
    expect(configEnvName('keys.maxMissingRatio')).toBe('SCOUT_KEYS_MAX_MISSING_RATIO');
    expect(configEnvName('relationships.minMatchStrength')).toBe('SCOUT_RELATIONSHIPS_MIN_MATCH_STRENGTH');
  });

  it('reads numeric settings and token lists', () => {
    const config = configFromEnv({
      SCOUT_KEYS_MAX_MISSING_RATIO: '0.1',
      SCOUT_ROLES_FACT_MIN_ROWS: '',
      SCOUT_CLEANING_MISSING_TOKENS: 'NA,?'
    });
    expect(config.keys.maxMissingRatio).toBe(0.1);
    expect(config.roles.factMinRows).toBe(100);
    expect(config.cleaning.missingTokens).toEqual(['na', '?']);
  });

  it('rejects non-numeric values', () => {
    expect(() => configFromEnv({ SCOUT_KEYS_MIN_ROWS: 'many' })).toThrow(
      'SCOUT_KEYS_MIN_ROWS must be numeric, got "many"'
    );
  });
});

describe('EngineError', () => {
  it('exposes a response shape with details', () => {
    const err = new ShapeError('bad table', { dataset: 'x' });
    expect(err).toBeInstanceOf(EngineError);
    expect(err.name).toBe('ShapeError');
    expect(err.toResponse()).toEqual({ code: ErrorCode.SHAPE_ERROR, message: 'bad table', details: { dataset: 'x' } });
  });

  it('wraps foreign errors and keeps engine errors as they are', () => {
    const shape = new ShapeError('bad table');
    expect(toEngineError(shape, ErrorCode.INGEST_ERROR)).toBe(shape);

    const wrapped = toEngineError(new Error('disk full'), ErrorCode.INGEST_ERROR);
    expect(wrapped.toResponse()).toEqual({
      code: ErrorCode.INGEST_ERROR,
      message: 'disk full',
      cause: 'Error: disk full'
    });
    expect(toEngineError('boom').code).toBe(ErrorCode.GENERAL_ERROR);
  });
});

describe('Logger', () => {
  it('writes messages at or above its level to stderr', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = new Logger({ level: 'warn' });
    logger.info('hidden');
    logger.warn('shown', { rows: 1 });

    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith('[schema-scout] WARN: shown {"rows":1}\n');
    write.mockRestore();
  });

  it('can change level at runtime', () => {
    const logger = new Logger({ level: 'warn' });
    logger.setLevel('debug');
    expect(logger.getLevel()).toBe('debug');
  });
});
