import { InputRecorderConfigSchema, parseConfig } from './config';
import type { InputRecorderInput } from './config';
import { InputLogRecorder } from './InputLogRecorder';
import type { InputHook, MouseInputEvent } from './types';

export type MouseLogRecord =
  | { timestamp: number; type: 'move'; x: number; y: number }
  | { timestamp: number; type: 'click'; x: number; y: number; button: string; isPressed: boolean }
  | { timestamp: number; type: 'scroll'; x: number; y: number; dx: number; dy: number };

export class MouseRecorder extends InputLogRecorder<MouseInputEvent, MouseLogRecord> {
  readonly name = 'mouse';
  protected readonly fileName = 'mouse_logs.json';

  constructor(hook: InputHook<MouseInputEvent>, options: InputRecorderInput = {}) {
    super(hook, parseConfig(InputRecorderConfigSchema, options, 'mouse recording').joinTimeoutMs);
  }

  protected toRecord(event: MouseInputEvent, timestamp: number): MouseLogRecord {
    switch (event.type) {
      case 'move':
        return { timestamp, type: 'move', x: event.x, y: event.y };
      case 'click':
        return { timestamp, type: 'click', x: event.x, y: event.y, button: event.button, isPressed: event.pressed };
      case 'scroll':
        return { timestamp, type: 'scroll', x: event.x, y: event.y, dx: event.dx, dy: event.dy };
    }
  }
}
