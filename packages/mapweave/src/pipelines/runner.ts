/**
 * Pipeline Runner
 *
 * Runs the point and join pipelines side by side with a boundary around each:
 * a failure in one is logged with its triggering condition, recorded in the
 * result, and never stops the other.
 */

import { isMapweaveError } from '../core/errors.js';
import { logger as defaultLogger, type PipelineLogger } from '../core/utils/logger.js';
import type { JoinPipelineResult } from './join-pipeline.js';
import type { PointPipelineResult } from './point-pipeline.js';

export type PipelineName = 'point' | 'join';

export type PipelineOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Error };

/**
 * Jobs are thunks so that reading inputs happens inside the boundary too
 */
export interface PipelineJobs {
  readonly point?: () => Promise<PointPipelineResult>;
  readonly join?: () => Promise<JoinPipelineResult>;
}

export interface PipelineRunResult {
  readonly point?: PipelineOutcome<PointPipelineResult>;
  readonly join?: PipelineOutcome<JoinPipelineResult>;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run one job, converting any failure into an outcome
 */
export async function isolatePipeline<T>(
  name: PipelineName,
  job: () => Promise<T>,
  log: PipelineLogger = defaultLogger
): Promise<PipelineOutcome<T>> {
  const startTime = Date.now();
  try {
    const value = await job();
    log.info('Pipeline completed', { pipeline: name, duration_ms: Date.now() - startTime });
    return { ok: true, value };
  } catch (caught) {
    const error = toError(caught);
    log.error('Pipeline failed', {
      pipeline: name,
      error: error.message,
      ...(isMapweaveError(error) ? { code: error.code, ...error.details } : {}),
      duration_ms: Date.now() - startTime,
    });
    return { ok: false, error };
  }
}

/**
 * Run every supplied pipeline, each isolated from the other's failure
 */
export async function runPipelines(
  jobs: PipelineJobs,
  log: PipelineLogger = defaultLogger
): Promise<PipelineRunResult> {
  const [point, join] = await Promise.all([
    jobs.point ? isolatePipeline('point', jobs.point, log) : undefined,
    jobs.join ? isolatePipeline('join', jobs.join, log) : undefined,
  ]);

  return {
    ...(point ? { point } : {}),
    ...(join ? { join } : {}),
  };
}

/**
 * Count failed pipelines in a run
 */
export function countFailures(result: PipelineRunResult): number {
  return [result.point, result.join].filter((outcome) => outcome?.ok === false).length;
}
