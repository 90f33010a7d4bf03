import { InputRecorderConfigSchema, parseConfig } from './config';
import type { InputRecorderInput } from './config';
import { InputLogRecorder } from './InputLogRecorder';
import type { InputHook, KeyInputEvent } from './types';

export interface KeyboardLogRecord {
  timestamp: number;
  type: 'pressed' | 'released';
  key: string;
}

export class KeyboardRecorder extends InputLogRecorder<KeyInputEvent, KeyboardLogRecord> {
  readonly name = 'keyboard';
  protected readonly fileName = 'keyboard_logs.json';

  constructor(hook: InputHook<KeyInputEvent>, options: InputRecorderInput = {}) {
    super(hook, parseConfig(InputRecorderConfigSchema, options, 'keyboard recording').joinTimeoutMs);
  }

  protected toRecord(event: KeyInputEvent, timestamp: number): KeyboardLogRecord {
    return { timestamp, type: event.type, key: event.key };
  }
}
