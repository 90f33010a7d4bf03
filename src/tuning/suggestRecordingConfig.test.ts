import { describe, expect, it } from 'vitest';
import { FakeGrabber, MemoryPersister, tempRoot } from '../test/fakes';
import type { SaveTelemetry, ScreenReport } from '../recording/types';
import { evaluateTrial, nextTargetFps, suggestRecordingConfig } from './suggestRecordingConfig';

const report = (fps: number, grabTime: number, saveTimes: number[]): ScreenReport => ({
  kind: 'screen',
  grab: { kind: 'grab', fps, elapsedTime: grabTime, maxStableFps: Math.floor(fps), framesProduced: 10, timestamps: [] },
  saves: saveTimes.map((elapsedTime, workerId): SaveTelemetry => ({ kind: 'save', workerId, fps: 1, elapsedTime, framesPersisted: 5 })),
  missing: [],
  framesProduced: 10,
  framesPersisted: 10,
  droppedFrames: 0,
  timestampsFile: null,
});

describe('evaluateTrial', () => {
  it('accepts a trial that keeps up with capture', () => {
    const trial = evaluateTrial(2, 20, report(19.2, 2, [2.4, 2.9]));
    expect(trial).toMatchObject({ workerCount: 2, targetFps: 20, meanFps: 19.2, maxStableFps: 19, safe: true });
    expect(trial.reasons).toEqual([]);
  });

  it('flags a slow capture rate and lagging sinks', () => {
    const trial = evaluateTrial(1, 20, report(15, 2, [3.5]));
    expect(trial.safe).toBe(false);
    expect(trial.reasons).toEqual([
      "Can't record screen at 20 fps, reached 15.00",
      'Save time 3.50s exceeds grab time 2.00s by more than 1s',
    ]);
  });
});

describe('nextTargetFps', () => {
  it('drops to the achieved rate rounded to tens, at least 10 below the last target', () => {
    expect(nextTargetFps(60, 43.4)).toBe(40);
    expect(nextTargetFps(60, 58)).toBe(50);
  });
});

describe('suggestRecordingConfig', () => {
  it('runs one trial per worker count when the first target is safe', async () => {
    const result = await suggestRecordingConfig({
      maxWorkers: 2,
      maxFps: 10,
      framesPerTrial: 5,
      outputRoot: tempRoot(),
      grabber: new FakeGrabber(),
      persister: new MemoryPersister(),
    });
    expect(result.trials.map((trial) => [trial.workerCount, trial.targetFps, trial.safe])).toEqual([
      [1, 10, true],
      [2, 10, true],
    ]);
    expect(result.best?.targetFps).toBe(10);
    expect([1, 2]).toContain(result.best?.workerCount);
  });
});
