import { HotkeyConfigSchema, parseConfig } from './config';
import type { HotkeyInput } from './config';
import { canonicalKey, parseHotkey } from './hotkey';
import { RecorderBase } from './RecorderBase';
import type { Availability, HotkeyOutcome, InputHook, KeyInputEvent } from './types';

/** Requests a session stop once every key of `hotkey` is held down at the same time. */
export class HotkeyStopRecorder extends RecorderBase<HotkeyOutcome> {
  readonly name = 'hotkey';
  readonly hotkey: string;
  private readonly combination: string[];
  private readonly pressed = new Set<string>();
  private triggered = false;

  constructor(
    private readonly hook: InputHook<KeyInputEvent>,
    options: HotkeyInput = {},
  ) {
    const config = parseConfig(HotkeyConfigSchema, options, 'hotkey');
    super(config.joinTimeoutMs);
    this.hotkey = config.hotkey;
    this.combination = parseHotkey(config.hotkey);
  }

  async checkAvailability(): Promise<Availability> {
    if (!this.hook.isAvailable) return { ok: true };
    const available = await this.hook.isAvailable();
    return available ? { ok: true } : { ok: false, reason: 'No keyboard to listen for the stop hotkey.' };
  }

  isTriggered() {
    return this.triggered;
  }

  protected async _start() {
    await this.hook.start((event) => this.handleKey(event));
  }

  protected _shouldStop() {
    return this.triggered;
  }

  protected _stop() {
    return this.hook.stop();
  }

  protected async _join(): Promise<HotkeyOutcome> {
    if (this.hook.isActive()) {
      this.warn('Hotkey listener did not stop.');
    }
    return { kind: 'hotkey', hotkey: this.hotkey, triggered: this.triggered };
  }

  private handleKey(event: KeyInputEvent) {
    const key = canonicalKey(event.key);
    if (event.type === 'released') {
      this.pressed.delete(key);
      return;
    }
    this.pressed.add(key);
    if (!this.triggered && this.combination.every((k) => this.pressed.has(k))) {
      this.triggered = true;
      this.log('Stop hotkey pressed', this.hotkey);
    }
  }
}
