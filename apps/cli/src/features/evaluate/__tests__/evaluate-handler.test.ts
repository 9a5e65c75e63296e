import { assertErr, assertOk } from '@withdrawal-audit/core/test-utils';
import { describe, expect, it, vi } from 'vitest';

import { EvaluateHandler } from '../evaluate-handler.js';

function fileNotFound(path: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), { code: 'ENOENT' });
}

function createReader(files: Record<string, string>) {
  return vi.fn(async (path: string): Promise<string> => {
    const content = files[path];
    if (content === undefined) {
      throw fileNotFound(path);
    }
    return content;
  });
}

const measurements = JSON.stringify([
  {
    id: 'slow-bank',
    appliedAmount: 1000,
    receivedAmount: 995,
    appliedCurrency: 'USDT',
    receivedCurrency: 'USDT',
    durationMinutes: 12,
    kycStatus: 'none',
    settlementStatus: 'success',
  },
  { id: 'empty' },
]);

describe('EvaluateHandler', () => {
  it('evaluates every record against the chosen profile', async () => {
    const handler = new EvaluateHandler(createReader({ 'records.json': measurements }));

    const result = assertOk(await handler.execute({ file: 'records.json', profile: 'default' }));

    expect(result.profile).toBe('default');
    expect(result.records.map((record) => record.id)).toEqual(['slow-bank', 'empty']);
    expect(result.records[0]?.evaluation.result.speed.code).toBe('fast');
    expect(result.records[0]?.evaluation.result.overallCode).toBe('low_risk');
    expect(result.records[1]?.evaluation.result.overallCode).toBe('high_risk');
  });

  it('applies the config file on top of the profile', async () => {
    const reader = createReader({
      'records.json': measurements,
      'thresholds.json': '{"speed": {"fast": 10}}',
    });
    const handler = new EvaluateHandler(reader);

    const result = assertOk(
      await handler.execute({ file: 'records.json', profile: 'strict', configPath: 'thresholds.json' })
    );

    expect(result.config.speed).toEqual({ instant: 1, fast: 10, slow: 120 });
    expect(result.records[0]?.evaluation.result.speed.code).toBe('normal');
    expect(reader).toHaveBeenCalledTimes(2);
  });

  it('reports a missing measurement file as not found', async () => {
    const handler = new EvaluateHandler(createReader({}));

    const error = assertErr(await handler.execute({ file: 'missing.json', profile: 'default' }));

    expect(error.message).toBe('Measurement file not found: missing.json');
    expect(error.exitCode).toBe(4);
  });

  it('reports a missing config file as a config error without reading measurements', async () => {
    const reader = createReader({ 'records.json': measurements });
    const handler = new EvaluateHandler(reader);

    const error = assertErr(
      await handler.execute({ file: 'records.json', profile: 'default', configPath: 'thresholds.json' })
    );

    expect(error.message).toBe('Config file not found: thresholds.json');
    expect(error.exitCode).toBe(11);
    expect(reader).toHaveBeenCalledTimes(1);
  });

  it('reports invalid config contents as a config error', async () => {
    const handler = new EvaluateHandler(
      createReader({ 'records.json': measurements, 'thresholds.json': '{"loss": {"critical": 5}}' })
    );

    const error = assertErr(
      await handler.execute({ file: 'records.json', profile: 'default', configPath: 'thresholds.json' })
    );

    expect(error.message).toBe("Invalid classification config: loss: Unrecognized key(s) in object: 'critical'");
    expect(error.exitCode).toBe(11);
  });

  it('reports invalid measurements as a validation error', async () => {
    const handler = new EvaluateHandler(createReader({ 'records.json': '[{"durationMinutes": "fast"}]' }));

    const error = assertErr(await handler.execute({ file: 'records.json', profile: 'default' }));

    expect(error.message).toBe(
      'Invalid measurement file: record 1: durationMinutes: Expected number, received string'
    );
    expect(error.exitCode).toBe(8);
  });

  it('reports other read failures as general errors', async () => {
    const reader = vi.fn(async (_path: string): Promise<string> => {
      throw new Error('EACCES: permission denied');
    });
    const handler = new EvaluateHandler(reader);

    const error = assertErr(await handler.execute({ file: 'records.json', profile: 'default' }));

    expect(error.message).toBe('Failed to read measurement file records.json: EACCES: permission denied');
    expect(error.exitCode).toBe(1);
  });
});
