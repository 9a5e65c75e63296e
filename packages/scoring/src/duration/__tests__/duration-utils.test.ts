import { assertErr, assertOk } from '@withdrawal-audit/core/test-utils';
import { describe, expect, it } from 'vitest';

import { CLASSIFICATION_PROFILES, resolveClassificationConfig } from '../../config/classification-config.js';
import {
  classifySpeed,
  durationFromTimestamps,
  formatDuration,
  validateDurationInput,
} from '../duration-utils.js';

describe('durationFromTimestamps', () => {
  it('converts seconds to minutes', () => {
    expect(durationFromTimestamps(1_700_000_000, 1_700_000_600)).toBe(10);
  });

  it('rounds to 2 decimal places', () => {
    expect(durationFromTimestamps(1000, 1100)).toBe(1.67);
    expect(durationFromTimestamps(0, 7)).toBe(0.12);
  });

  it('returns zero for identical timestamps', () => {
    expect(durationFromTimestamps(1000, 1000)).toBe(0);
  });

  it('returns null when the end precedes the start', () => {
    expect(durationFromTimestamps(1000, 500)).toBeNull();
  });

  it('returns null when a timestamp is missing or not finite', () => {
    expect(durationFromTimestamps(null, 500)).toBeNull();
    expect(durationFromTimestamps(1000, undefined)).toBeNull();
    expect(durationFromTimestamps(Number.NaN, 500)).toBeNull();
  });
});

describe('formatDuration', () => {
  it('returns an empty string for unusable input', () => {
    expect(formatDuration(null)).toBe('');
    expect(formatDuration(undefined)).toBe('');
    expect(formatDuration(-1)).toBe('');
    expect(formatDuration(Number.NaN)).toBe('');
    expect(formatDuration(Number.POSITIVE_INFINITY)).toBe('');
  });

  it('renders sub-minute durations as instant', () => {
    expect(formatDuration(0)).toBe('秒级');
    expect(formatDuration(0.3)).toBe('秒级');
    expect(formatDuration(0.99)).toBe('秒级');
  });

  it('renders minutes with one decimal and strips ".0"', () => {
    expect(formatDuration(1)).toBe('1分钟');
    expect(formatDuration(7.5)).toBe('7.5分钟');
    expect(formatDuration(10)).toBe('10分钟');
    expect(formatDuration(12.34)).toBe('12.3分钟');
    expect(formatDuration(12.35)).toBe('12.4分钟');
  });

  it('keeps values that round up to 60 in minutes', () => {
    expect(formatDuration(59.99)).toBe('60分钟');
  });

  it('renders an hour or more in hours', () => {
    expect(formatDuration(60)).toBe('1小时');
    expect(formatDuration(90)).toBe('1.5小时');
    expect(formatDuration(120)).toBe('2小时');
    expect(formatDuration(100)).toBe('1.7小时');
  });
});

describe('classifySpeed', () => {
  it('returns unknown for missing, negative or non-finite minutes', () => {
    for (const minutes of [null, undefined, -0.5, Number.NaN, Number.NEGATIVE_INFINITY, Number.POSITIVE_INFINITY]) {
      expect(classifySpeed(minutes)).toEqual({
        code: 'unknown',
        label: '耗时数据缺失',
        score: -1,
        tags: ['耗时数据缺失'],
      });
    }
  });

  it('classifies against the default thresholds', () => {
    expect(classifySpeed(0).code).toBe('instant');
    expect(classifySpeed(8)).toEqual({ code: 'fast', label: '快速出款', score: 1, tags: ['快速出款'] });
    expect(classifySpeed(120)).toEqual({ code: 'normal', label: '出款时效正常', score: 0, tags: ['出款时效正常'] });
    expect(classifySpeed(241)).toEqual({ code: 'slow', label: '出款偏慢', score: -2, tags: ['出款偏慢'] });
  });

  it('puts boundary values in the faster band', () => {
    expect(classifySpeed(5)).toEqual({ code: 'instant', label: '秒级出款', score: 2, tags: ['秒级出款'] });
    expect(classifySpeed(5.01).code).toBe('fast');
    expect(classifySpeed(30).code).toBe('fast');
    expect(classifySpeed(30.01).code).toBe('normal');
    expect(classifySpeed(240).code).toBe('normal');
    expect(classifySpeed(240.01).code).toBe('slow');
  });

  it('never increases the score as minutes grow', () => {
    const samples = [0, 1, 4.99, 5, 5.5, 15, 30, 31, 100, 240, 241, 1000];
    const scores = samples.map((minutes) => classifySpeed(minutes).score);

    for (let i = 1; i < scores.length; i++) {
      expect(scores[i]).toBeLessThanOrEqual(scores[i - 1] ?? Number.POSITIVE_INFINITY);
    }
  });

  it('uses the strict profile thresholds', () => {
    const strict = CLASSIFICATION_PROFILES.strict;

    expect(classifySpeed(1, strict).code).toBe('instant');
    expect(classifySpeed(5, strict).code).toBe('fast');
    expect(classifySpeed(60, strict).code).toBe('normal');
    expect(classifySpeed(121, strict).code).toBe('slow');
  });

  it('uses overridden thresholds merged per field', () => {
    const config = resolveClassificationConfig({ speed: { instant: 2 } });

    expect(classifySpeed(3, config).code).toBe('fast');
    expect(classifySpeed(30, config).code).toBe('fast');
    expect(classifySpeed(200, config).code).toBe('normal');
  });
});

describe('validateDurationInput', () => {
  it('accepts empty values as not recorded', () => {
    expect(assertOk(validateDurationInput(null))).toBeNull();
    expect(assertOk(validateDurationInput(undefined))).toBeNull();
    expect(assertOk(validateDurationInput(''))).toBeNull();
  });

  it('accepts numbers and numeric strings', () => {
    expect(assertOk(validateDurationInput(12.5))).toBe(12.5);
    expect(assertOk(validateDurationInput(' 45 '))).toBe(45);
    expect(assertOk(validateDurationInput(43_200))).toBe(43_200);
  });

  it('rejects non-numeric values', () => {
    const error = assertErr(validateDurationInput('about ten'));

    expect(error.reason).toBe('not_numeric');
    expect(error.message).toBe('提款耗时必须为数字（分钟）');
    expect(assertErr(validateDurationInput({ minutes: 3 })).reason).toBe('not_numeric');
  });

  it('rejects hex, binary and octal literals', () => {
    expect(assertErr(validateDurationInput('0x1E')).reason).toBe('not_numeric');
    expect(assertErr(validateDurationInput('0b101')).reason).toBe('not_numeric');
    expect(assertErr(validateDurationInput('0o17')).reason).toBe('not_numeric');
    expect(assertErr(validateDurationInput('Infinity')).reason).toBe('not_numeric');
  });

  it('accepts decimal and exponent notation', () => {
    expect(assertOk(validateDurationInput('.5'))).toBe(0.5);
    expect(assertOk(validateDurationInput('+12.'))).toBe(12);
    expect(assertOk(validateDurationInput('1.5e2'))).toBe(150);
  });

  it('rejects negative durations', () => {
    const error = assertErr(validateDurationInput(-3));

    expect(error.reason).toBe('negative');
    expect(error.message).toBe('提款耗时不能为负数，请检查填写的时间');
  });

  it('rejects durations longer than 30 days', () => {
    const error = assertErr(validateDurationInput('43201'));

    expect(error.reason).toBe('too_long');
    expect(error.message).toBe('提款耗时超过30天，请核实数据是否正确');
  });
});
