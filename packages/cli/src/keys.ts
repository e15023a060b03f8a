import type { ConsoleKey } from '@conpane/core';

export const END_OF_INPUT = '\x04';

const SEQUENCES = new Map<string, ConsoleKey>([
  ['\r', { name: 'enter' }],
  ['\n', { name: 'enter' }],
  ['\x7f', { name: 'backspace' }],
  ['\b', { name: 'backspace' }],
  ['\x1b', { name: 'escape' }],
  ['\x03', { name: 'interrupt' }],
  ['\x0c', { name: 'clear-screen' }],
  ['\x1b[A', { name: 'up' }],
  ['\x1b[B', { name: 'down' }],
  ['\x1b[C', { name: 'right' }],
  ['\x1b[D', { name: 'left' }],
  ['\x1bOA', { name: 'up' }],
  ['\x1bOB', { name: 'down' }],
  ['\x1bOC', { name: 'right' }],
  ['\x1bOD', { name: 'left' }],
  ['\x1b[H', { name: 'home' }],
  ['\x1bOH', { name: 'home' }],
  ['\x1b[1~', { name: 'home' }],
  ['\x01', { name: 'home' }],
  ['\x1b[F', { name: 'end' }],
  ['\x1bOF', { name: 'end' }],
  ['\x1b[4~', { name: 'end' }],
  ['\x05', { name: 'end' }],
  ['\x1b[3~', { name: 'delete' }],
]);

/**
 * One key per match, tried in order: a CSI sequence (parameters, intermediates,
 * final byte), an SS3 sequence, Alt+key (escape plus any non-escape character),
 * a lone escape, a run of printable characters, any other single character.
 */
const KEY_PATTERN = /\x1b\[[\x30-\x3f]*[\x20-\x2f]*[\x40-\x7e]?|\x1bO.?|\x1b[^\x1b]?|[^\x00-\x1f\x7f]+|[\s\S]/g;

const PRINTABLE = /^[^\x00-\x1f\x7f]+$/;

/**
 * Splits a stdin chunk into keys. A run of printable characters (typing ahead
 * or a paste) stays together so it is inserted as one edit; an escape directly
 * followed by another escape is a key of its own.
 */
export function splitInput(data: string): string[] {
  return Array.from(data.matchAll(KEY_PATTERN), (match) => match[0]);
}

/** Maps one keypress to a console key; undefined for keys the console ignores. */
export function toConsoleKey(chunk: string): ConsoleKey | undefined {
  const known = SEQUENCES.get(chunk);
  if (known) return known;
  if (PRINTABLE.test(chunk)) {
    return { name: 'text', text: chunk };
  }
  return undefined;
}
