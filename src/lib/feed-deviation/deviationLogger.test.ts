/**
 * Deviation run logger – unit tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createDeviationRunLogger } from './deviationLogger';

function parseLine(line: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(line);
  assert(typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed));
  return { ...parsed };
}

describe('createDeviationRunLogger', () => {
  it('writes nothing when disabled', () => {
    const lines: string[] = [];
    const logger = createDeviationRunLogger({
      enabled: false,
      sink: (line) => lines.push(line),
    });
    logger.event('run_start');
    logger.stage('filter', { before: 3, after: 1 });
    assert.deepStrictEqual(lines, []);
  });

  it('adds rejected counts to stage results', () => {
    const lines: string[] = [];
    const logger = createDeviationRunLogger({
      runId: 'run-a',
      enabled: true,
      sink: (line) => lines.push(line),
    });
    logger.stage('filter', { before: 10, after: 7 }, 4);
    const entry = parseLine(lines[0]);
    assert.strictEqual(typeof entry.ts, 'string');
    assert.deepStrictEqual(
      { ...entry, ts: undefined },
      {
        ts: undefined,
        runId: 'run-a',
        event: 'stage_result',
        stage: 'filter',
        counts: { before: 10, after: 7, rejected: 3 },
        durationMs: 4,
      },
    );
  });

  it('logs per-batch details only in verbose mode', () => {
    const lines: string[] = [];
    const quiet = createDeviationRunLogger({
      enabled: true,
      verbose: false,
      sink: (line) => lines.push(line),
    });
    quiet.batch('B1', { weightedAvgPct: 3.6 });
    assert.strictEqual(lines.length, 0);

    const verbose = createDeviationRunLogger({
      enabled: true,
      verbose: true,
      sink: (line) => lines.push(line),
    });
    verbose.batch('B1', { weightedAvgPct: 3.6 });
    const entry = parseLine(lines[0]);
    assert.strictEqual(entry.event, 'batch_aggregate');
    assert.strictEqual(entry.batchCode, 'B1');
    assert.strictEqual(entry.weightedAvgPct, 3.6);
  });

  it('generates a run id when none is given', () => {
    const logger = createDeviationRunLogger({ enabled: false });
    assert.match(logger.runId, /^run-\d+-[a-z0-9]+$/);
  });
});
