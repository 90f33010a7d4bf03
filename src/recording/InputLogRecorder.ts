import { promises as fsp } from 'fs';
import path from 'path';
import { RecorderBase } from './RecorderBase';
import { wallClockSeconds } from './timing';
import type { Availability, InputHook, InputLogSummary } from './types';

export interface InputLogRecord {
  timestamp: number;
  type: string;
}

/**
 * Records every event of an input hook with its capture time and writes them as one JSON array
 * to `fileName` in the session directory on join.
 */
export abstract class InputLogRecorder<TEvent, TRecord extends InputLogRecord> extends RecorderBase<InputLogSummary> {
  protected abstract readonly fileName: string;
  private readonly records: TRecord[] = [];

  protected constructor(
    protected readonly hook: InputHook<TEvent>,
    joinTimeoutMs: number,
  ) {
    super(joinTimeoutMs);
  }

  getRecords(): readonly TRecord[] {
    return this.records;
  }

  async checkAvailability(): Promise<Availability> {
    if (!this.hook.isAvailable) return { ok: true };
    const available = await this.hook.isAvailable();
    return available ? { ok: true } : { ok: false, reason: `No ${this.name} input device found.` };
  }

  /** Maps a raw event to its log record, or `null` to leave it out. */
  protected abstract toRecord(event: TEvent, timestamp: number): TRecord | null;

  protected async _start() {
    await this.hook.start((event) => {
      const record = this.toRecord(event, wallClockSeconds());
      if (record) this.records.push(record);
    });
  }

  protected _shouldStop() {
    return !this.hook.isActive();
  }

  protected _stop() {
    return this.hook.stop();
  }

  protected async _join(): Promise<InputLogSummary> {
    if (this.hook.isActive()) {
      this.warn(`${this.name} listener did not stop.`);
    }
    const lastError = this.hook.getLastError?.();
    if (lastError) {
      this.warn(`${this.name} listener failed: ${lastError}`);
    }
    const file = path.join(this.outputDir, this.fileName);
    await fsp.writeFile(file, JSON.stringify(this.records), 'utf-8');
    return { kind: 'input-log', file, events: this.records.length };
  }
}
