import { createError } from './errors';
import type { GrabTelemetry, SaveTelemetry, TelemetryRecord } from './types';

export interface ScreenTelemetry {
  grab: GrabTelemetry | null;
  saves: SaveTelemetry[];
  missing: string[];
  framesProduced: number;
  framesPersisted: number;
}

/**
 * Collects the one grab record and the per-sink save records of a screen recording.
 * Records that never arrived are listed in `missing` as `grab` or `save:<workerId>`.
 */
export class TelemetryAggregator {
  private grab: GrabTelemetry | null = null;
  private readonly saves = new Map<number, SaveTelemetry>();

  constructor(private readonly workerCount: number) {}

  add(record: TelemetryRecord) {
    if (record.kind === 'grab') {
      if (this.grab) {
        throw createError('Multiple grab telemetry records for one screen recording', 500);
      }
      this.grab = record;
      return;
    }
    if (record.workerId < 0 || record.workerId >= this.workerCount) {
      throw createError(`Save telemetry from unknown sink ${record.workerId}`, 500);
    }
    if (this.saves.has(record.workerId)) {
      throw createError(`Multiple save telemetry records for sink ${record.workerId}`, 500);
    }
    this.saves.set(record.workerId, record);
  }

  build(): ScreenTelemetry {
    const missing: string[] = [];
    if (!this.grab) missing.push('grab');
    const saves: SaveTelemetry[] = [];
    for (let workerId = 0; workerId < this.workerCount; workerId += 1) {
      const save = this.saves.get(workerId);
      if (save) {
        saves.push(save);
      } else {
        missing.push(`save:${workerId}`);
      }
    }
    return {
      grab: this.grab,
      saves,
      missing,
      framesProduced: this.grab?.framesProduced ?? 0,
      framesPersisted: saves.reduce((sum, save) => sum + save.framesPersisted, 0),
    };
  }
}

const round2 = (value: number) => Math.round(value * 100) / 100;

/**
 * Operator-facing performance lines. Save fps is scaled by the worker count so each figure reads
 * as the throughput the pool would reach at that sink's pace.
 */
export function summarizeScreenTelemetry(telemetry: ScreenTelemetry, workerCount: number): string[] {
  const lines: string[] = [];
  if (telemetry.grab) {
    lines.push(`Grab FPS: ${round2(telemetry.grab.fps)}`);
    lines.push(`Grab time: ${round2(telemetry.grab.elapsedTime)}`);
    lines.push(`Max stable FPS: ${telemetry.grab.maxStableFps}`);
  }
  lines.push(`Saving FPS: [${telemetry.saves.map((save) => round2(save.fps * workerCount)).join(', ')}]`);
  lines.push(`Save times: [${telemetry.saves.map((save) => round2(save.elapsedTime)).join(', ')}]`);
  if (telemetry.missing.length) {
    lines.push(`Missing telemetry: ${telemetry.missing.join(', ')}`);
  }
  return lines;
}
