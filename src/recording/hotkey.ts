import { createError } from './errors';

const MODIFIERS = ['ctrl', 'shift', 'alt', 'cmd'];

/** Lowercases a key name and folds left/right modifier variants (`ctrl_l`, `alt_gr`) together. */
export function canonicalKey(key: string): string {
  const lowered = key.toLowerCase();
  const match = /^(ctrl|shift|alt|cmd)(?:_(?:l|r|gr))?$/.exec(lowered);
  if (match && MODIFIERS.includes(match[1])) return match[1];
  return lowered;
}

/**
 * Parses a combination such as `<ctrl>+<shift>+<delete>` or `<alt>+q` into canonical key names.
 * Named keys are wrapped in angle brackets; bare tokens must be a single character.
 */
export function parseHotkey(hotkey: string): string[] {
  const tokens = hotkey.split('+');
  const keys = tokens.map((token) => {
    const named = /^<([a-z0-9_]+)>$/i.exec(token);
    if (named) return canonicalKey(named[1]);
    if (token.length === 1) return canonicalKey(token);
    throw createError(`Invalid hotkey "${hotkey}": cannot parse "${token}"`, 400);
  });
  if (new Set(keys).size !== keys.length) {
    throw createError(`Invalid hotkey "${hotkey}": repeated key`, 400);
  }
  return keys;
}
