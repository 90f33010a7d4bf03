import { InputRecorderConfigSchema, parseConfig } from './config';
import type { InputRecorderInput } from './config';
import { errorMessage } from './errors';
import { InputLogRecorder } from './InputLogRecorder';
import { sleep } from './timing';
import type { GamepadEvent, GamepadSource, InputHook, Logger } from './types';

export type GamepadLogRecord =
  | { timestamp: number; type: 'pressed' | 'released'; key: string }
  | { timestamp: number; type: 'absolute'; axis: string; value: number };

const IDLE_POLL_MS = 10;

/**
 * Turns a blocking gamepad source into an input hook by reading it in a loop.
 * A `read()` that never returns keeps the hook active; stopping only takes effect between reads.
 */
export class GamepadPoller implements InputHook<GamepadEvent> {
  private running = false;
  private stopRequested = false;
  private loop: Promise<void> = Promise.resolve();
  private lastError: string | null = null;

  constructor(
    private readonly source: GamepadSource,
    private readonly logger?: Logger,
  ) {}

  async isAvailable() {
    const gamepads = await this.source.listGamepads();
    return gamepads.length > 0;
  }

  start(listener: (event: GamepadEvent) => void) {
    this.running = true;
    this.loop = this.poll(listener).finally(() => {
      this.running = false;
    });
  }

  stop() {
    this.stopRequested = true;
    return this.loop;
  }

  isActive() {
    return this.running;
  }

  getLastError() {
    return this.lastError;
  }

  private async poll(listener: (event: GamepadEvent) => void) {
    try {
      while (!this.stopRequested) {
        const events = await this.source.read();
        events.forEach(listener);
        if (!events.length) await sleep(IDLE_POLL_MS);
      }
    } catch (err) {
      this.lastError = errorMessage(err);
      this.logger?.('[gamepad]', 'Gamepad read failed', this.lastError);
    }
  }
}

export class GamepadRecorder extends InputLogRecorder<GamepadEvent, GamepadLogRecord> {
  readonly name = 'gamepad';
  protected readonly fileName = 'gamepad_logs.json';

  constructor(source: GamepadSource, options: InputRecorderInput & { logger?: Logger } = {}) {
    const { logger, ...settings } = options;
    super(new GamepadPoller(source, logger), parseConfig(InputRecorderConfigSchema, settings, 'gamepad recording').joinTimeoutMs);
  }

  protected toRecord(event: GamepadEvent, timestamp: number): GamepadLogRecord | null {
    if (event.evType === 'Key') {
      if (event.state === 1) return { timestamp, type: 'pressed', key: event.code };
      if (event.state === 0) return { timestamp, type: 'released', key: event.code };
      return null;
    }
    if (event.evType === 'Absolute') {
      return { timestamp, type: 'absolute', axis: event.code, value: event.state };
    }
    return null;
  }
}
