/**
 * Feed deviation run logger
 *
 * Structured logging for the analysis pipeline. Logs one JSON line per event via
 * console. Fully behind env flags.
 *
 * Env flags:
 *   FEED_DEVIATION_DEBUG_LOG=true      - Master switch
 *   FEED_DEVIATION_DEBUG_VERBOSE=true  - Per-batch details
 */

import type { AnalysisDiagnostic } from './feedDeviation.types';

function flag(name: string): boolean {
  const v = process.env[name];
  return v === 'true' || v === '1';
}

const DEBUG_LOG = flag('FEED_DEVIATION_DEBUG_LOG');
const DEBUG_VERBOSE = flag('FEED_DEVIATION_DEBUG_VERBOSE');

export type StageCounts = {
  before: number;
  after: number;
};

export type DeviationRunLogger = {
  runId: string;
  event: (name: string, payload?: Record<string, unknown>) => void;
  stage: (stageName: string, counts: StageCounts, durationMs?: number) => void;
  batch: (batchCode: string, payload: Record<string, unknown>) => void;
  diagnostic: (d: AnalysisDiagnostic) => void;
};

export type CreateRunLoggerParams = {
  runId?: string;
  /** Receives each serialized line; defaults to console.log. */
  sink?: (line: string) => void;
  /** Overrides the env flags (tests). */
  enabled?: boolean;
  verbose?: boolean;
};

export function createDeviationRunLogger(
  params: CreateRunLoggerParams = {},
): DeviationRunLogger {
  const runId =
    params.runId ??
    `run-${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
  const enabled = params.enabled ?? DEBUG_LOG;
  const verbose = params.verbose ?? DEBUG_VERBOSE;
  const sink = params.sink ?? ((line: string) => console.log(line));

  function event(name: string, payload: Record<string, unknown> = {}): void {
    if (!enabled) return;
    sink(
      JSON.stringify({
        ts: new Date().toISOString(),
        runId,
        event: name,
        ...payload,
      }),
    );
  }

  return {
    runId,
    event,
    stage(stageName, counts, durationMs) {
      event('stage_result', {
        stage: stageName,
        counts: { ...counts, rejected: counts.before - counts.after },
        durationMs,
      });
    },
    batch(batchCode, payload) {
      if (!verbose) return;
      event('batch_aggregate', { batchCode, ...payload });
    },
    diagnostic(d) {
      event('diagnostic', { ...d });
    },
  };
}
