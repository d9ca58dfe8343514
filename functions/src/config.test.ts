import {describe, it, expect, vi, afterEach} from 'vitest';
import {loadConfig} from './config';

describe('loadConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      weightUnit: 'kg',
      synonymsPath: undefined,
      onLineError: 'skip',
      tsvDecimalSeparator: ',',
    });
  });

  it('reads every setting', () => {
    expect(
      loadConfig({
        SETLOG_WEIGHT_UNIT: ' LB ',
        SETLOG_SYNONYMS_PATH: '/etc/setlog/synonyms.json',
        SETLOG_ON_LINE_ERROR: 'abort',
        SETLOG_TSV_DECIMAL_SEPARATOR: '.',
      })
    ).toEqual({
      weightUnit: 'lb',
      synonymsPath: '/etc/setlog/synonyms.json',
      onLineError: 'abort',
      tsvDecimalSeparator: '.',
    });
  });

  it('warns and keeps the default for invalid values', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const config = loadConfig({SETLOG_WEIGHT_UNIT: 'stone', SETLOG_ON_LINE_ERROR: 'retry'});

    expect(config.weightUnit).toBe('kg');
    expect(config.onLineError).toBe('skip');
    expect(warn).toHaveBeenCalledWith('Ignoring SETLOG_WEIGHT_UNIT="stone", using kg');
    expect(warn).toHaveBeenCalledWith('Ignoring SETLOG_ON_LINE_ERROR="retry", using skip');
  });

  it('treats a blank synonyms path as unset', () => {
    expect(loadConfig({SETLOG_SYNONYMS_PATH: '  '}).synonymsPath).toBeUndefined();
  });
});
