import type { ImageFormat } from '../recording/config';
import { ScreenRecorder } from '../recording/ScreenRecorder';
import { SessionManager } from '../recording/SessionManager';
import type { FramePersister, Logger, ScreenGrabber, ScreenReport } from '../recording/types';

export interface TuningOptions {
  maxWorkers?: number;
  maxFps?: number;
  minFps?: number;
  framesPerTrial?: number;
  outputRoot?: string;
  imageFormat?: ImageFormat;
  compression?: number;
  grabber?: ScreenGrabber;
  persister?: FramePersister;
  logger?: Logger;
}

export interface TuningTrial {
  workerCount: number;
  targetFps: number;
  meanFps: number;
  maxStableFps: number;
  grabTime: number;
  saveTimes: number[];
  safe: boolean;
  reasons: string[];
}

export interface TuningResult {
  trials: TuningTrial[];
  best: { workerCount: number; targetFps: number; maxStableFps: number } | null;
}

/**
 * A trial is unsafe when capture falls under 90% of the target rate, or when any sink needs more
 * than one second longer than capture did.
 */
export function evaluateTrial(workerCount: number, targetFps: number, report: ScreenReport): TuningTrial {
  const reasons: string[] = [];
  const grab = report.grab;
  const saveTimes = report.saves.map((save) => save.elapsedTime);
  if (!grab) {
    reasons.push('no grab telemetry');
  } else {
    if (grab.fps < 0.9 * targetFps) {
      reasons.push(`Can't record screen at ${targetFps} fps, reached ${grab.fps.toFixed(2)}`);
    }
    for (const saveTime of saveTimes) {
      if (saveTime > grab.elapsedTime + 1) {
        reasons.push(`Save time ${saveTime.toFixed(2)}s exceeds grab time ${grab.elapsedTime.toFixed(2)}s by more than 1s`);
      }
    }
  }
  if (report.missing.length) {
    reasons.push(`missing telemetry: ${report.missing.join(', ')}`);
  }
  return {
    workerCount,
    targetFps,
    meanFps: grab?.fps ?? 0,
    maxStableFps: grab?.maxStableFps ?? 0,
    grabTime: grab?.elapsedTime ?? 0,
    saveTimes,
    safe: reasons.length === 0,
    reasons,
  };
}

/** Next target after an unsafe trial: the achieved rate rounded to tens, and always at least 10 lower. */
export const nextTargetFps = (targetFps: number, meanFps: number) =>
  Math.min(Math.round(meanFps / 10) * 10, targetFps - 10);

/**
 * Searches for a safe worker count and capture rate: for each worker count, starts at `maxFps`
 * and lowers the target until a trial is safe or the target drops under `minFps`.
 */
export async function suggestRecordingConfig(options: TuningOptions = {}): Promise<TuningResult> {
  const {
    maxWorkers = 4,
    maxFps = 60,
    minFps = 10,
    framesPerTrial = 500,
    outputRoot = './screenshots/temp',
    imageFormat = 'png',
    compression = 6,
    grabber,
    persister,
    logger,
  } = options;
  const log = (...args: unknown[]) => logger?.('[tuning]', ...args);
  const trials: TuningTrial[] = [];

  for (let workerCount = 1; workerCount <= maxWorkers; workerCount += 1) {
    let targetFps = maxFps;
    while (targetFps >= minFps) {
      log(`Testing ${workerCount} workers at ${targetFps} fps`);
      const recorder = new ScreenRecorder({
        workerCount,
        targetFps,
        maxFrames: framesPerTrial,
        imageFormat,
        compression,
        grabber,
        persister,
      });
      const session = new SessionManager([recorder], { outputRoot, logger });
      const report = await session.runUntilStop();
      const screen = report.outcomes.find((entry) => entry.outcome.kind === 'screen')?.outcome;
      if (!screen || screen.kind !== 'screen') {
        log('Screen recorder produced no report', report.warnings.join('; '));
        break;
      }
      const trial = evaluateTrial(workerCount, targetFps, screen);
      trials.push(trial);
      if (trial.safe) {
        log(`Safe: ${workerCount} workers, mean ${trial.meanFps.toFixed(2)} fps, stable ${trial.maxStableFps} fps`);
        break;
      }
      trial.reasons.forEach((reason) => log(reason));
      targetFps = nextTargetFps(targetFps, trial.meanFps);
    }
  }

  const safe = trials.filter((trial) => trial.safe);
  const best = safe.reduce<TuningTrial | null>(
    (top, trial) => (!top || trial.maxStableFps > top.maxStableFps ? trial : top),
    null,
  );
  return {
    trials,
    best: best ? { workerCount: best.workerCount, targetFps: best.targetFps, maxStableFps: best.maxStableFps } : null,
  };
}
