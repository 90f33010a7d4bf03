import fs from 'fs';
import { describe, expect, it } from 'vitest';
import { tempRoot } from '../test/fakes';
import { GamepadRecorder } from './GamepadRecorder';
import { sleep } from './timing';
import type { GamepadEvent, GamepadSource } from './types';

/** Serves the given batches, then either blocks forever or keeps returning empty reads. */
class ScriptedGamepad implements GamepadSource {
  constructor(
    private readonly batches: GamepadEvent[][],
    private readonly blockWhenDrained: boolean,
    private readonly gamepads = ['Test Pad'],
  ) {}

  async listGamepads() {
    return this.gamepads;
  }

  read(): Promise<GamepadEvent[]> {
    const batch = this.batches.shift();
    if (batch) return Promise.resolve(batch);
    if (this.blockWhenDrained) return new Promise<GamepadEvent[]>(() => undefined);
    return Promise.resolve([]);
  }
}

describe('GamepadRecorder', () => {
  it('logs button and axis events and skips the rest', async () => {
    const source = new ScriptedGamepad(
      [
        [
          { evType: 'Key', code: 'BTN_SOUTH', state: 1 },
          { evType: 'Sync', code: 'SYN_REPORT', state: 0 },
        ],
        [
          { evType: 'Absolute', code: 'ABS_X', state: -512 },
          { evType: 'Key', code: 'BTN_SOUTH', state: 2 },
          { evType: 'Key', code: 'BTN_SOUTH', state: 0 },
        ],
      ],
      false,
    );
    const recorder = new GamepadRecorder(source);
    recorder.attach({ outputDir: tempRoot() });
    await recorder.start();
    await sleep(30);
    recorder.stop();

    const summary = await recorder.join();

    const records = JSON.parse(fs.readFileSync(summary.file, 'utf-8'));
    expect(records.map(({ timestamp, ...rest }: Record<string, unknown>) => rest)).toEqual([
      { type: 'pressed', key: 'BTN_SOUTH' },
      { type: 'absolute', axis: 'ABS_X', value: -512 },
      { type: 'released', key: 'BTN_SOUTH' },
    ]);
    expect(recorder.getWarnings()).toEqual([]);
  });

  it('gives up on a read that never returns and still writes its log', async () => {
    const source = new ScriptedGamepad([[{ evType: 'Key', code: 'BTN_EAST', state: 1 }]], true);
    const recorder = new GamepadRecorder(source, { joinTimeoutMs: 50 });
    recorder.attach({ outputDir: tempRoot() });
    await recorder.start();
    await sleep(20);
    recorder.stop();

    const summary = await recorder.join();

    expect(summary.events).toBe(1);
    expect(recorder.getWarnings()).toEqual([
      'gamepad recorder did not finish stopping within 50 ms',
      'gamepad listener did not stop.',
    ]);
  });

  it('asks to stop and warns when the gamepad read fails', async () => {
    const source = new ScriptedGamepad([], false);
    source.read = () => Promise.reject(new Error('device unplugged'));
    const recorder = new GamepadRecorder(source);
    recorder.attach({ outputDir: tempRoot() });
    await recorder.start();
    await sleep(20);

    expect(recorder.shouldStop()).toBe(true);
    recorder.stop();
    const summary = await recorder.join();

    expect(summary.events).toBe(0);
    expect(recorder.getRecords()).toEqual([]);
    expect(recorder.getWarnings()).toEqual(['gamepad listener failed: device unplugged']);
  });

  it('is unavailable without a connected gamepad', async () => {
    const recorder = new GamepadRecorder(new ScriptedGamepad([], false, []));
    expect(await recorder.checkAvailability()).toEqual({ ok: false, reason: 'No gamepad input device found.' });
  });
});
