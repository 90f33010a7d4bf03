import { describe, expect, it } from 'vitest';
import { FakeInputHook, tempRoot } from '../test/fakes';
import { canonicalKey, parseHotkey } from './hotkey';
import { HotkeyStopRecorder } from './HotkeyStopRecorder';
import type { KeyInputEvent } from './types';

describe('parseHotkey', () => {
  it('reads named keys and single characters', () => {
    expect(parseHotkey('<ctrl>+<shift>+<delete>')).toEqual(['ctrl', 'shift', 'delete']);
    expect(parseHotkey('<alt_gr>+Q')).toEqual(['alt', 'q']);
  });

  it('rejects bare multi-character tokens and repeats', () => {
    expect(() => parseHotkey('ctrl+c')).toThrow('Invalid hotkey "ctrl+c": cannot parse "ctrl"');
    expect(() => parseHotkey('<ctrl_l>+<ctrl_r>')).toThrow('Invalid hotkey "<ctrl_l>+<ctrl_r>": repeated key');
    expect(() => parseHotkey('<ctrl>+')).toThrow('Invalid hotkey "<ctrl>+": cannot parse ""');
  });

  it('folds left and right modifiers', () => {
    expect(canonicalKey('Ctrl_L')).toBe('ctrl');
    expect(canonicalKey('shift_r')).toBe('shift');
    expect(canonicalKey('Delete')).toBe('delete');
  });
});

describe('HotkeyStopRecorder', () => {
  const startRecorder = async (hotkey?: string) => {
    const hook = new FakeInputHook<KeyInputEvent>();
    const recorder = new HotkeyStopRecorder(hook, hotkey ? { hotkey } : {});
    recorder.attach({ outputDir: tempRoot() });
    await recorder.start();
    return { hook, recorder };
  };

  it('requests a stop once the whole combination is held', async () => {
    const { hook, recorder } = await startRecorder();
    hook.emit({ type: 'pressed', key: 'ctrl_l' });
    hook.emit({ type: 'pressed', key: 'shift' });
    expect(recorder.shouldStop()).toBe(false);
    expect(recorder.isTriggered()).toBe(false);
    hook.emit({ type: 'pressed', key: 'delete' });
    expect(recorder.isTriggered()).toBe(true);
    expect(recorder.shouldStop()).toBe(true);

    recorder.stop();
    expect(await recorder.join()).toEqual({ kind: 'hotkey', hotkey: '<ctrl>+<shift>+<delete>', triggered: true });
  });

  it('ignores keys released before the combination completes', async () => {
    const { hook, recorder } = await startRecorder('<alt>+q');
    hook.emit({ type: 'pressed', key: 'alt' });
    hook.emit({ type: 'released', key: 'alt' });
    hook.emit({ type: 'pressed', key: 'q' });
    expect(recorder.shouldStop()).toBe(false);
    hook.emit({ type: 'pressed', key: 'alt_r' });
    expect(recorder.shouldStop()).toBe(true);
  });

  it('rejects an unparsable hotkey at construction', () => {
    expect(() => new HotkeyStopRecorder(new FakeInputHook<KeyInputEvent>(), { hotkey: 'ctrl+c' })).toThrow(
      'Invalid hotkey "ctrl+c": cannot parse "ctrl"',
    );
  });
});
