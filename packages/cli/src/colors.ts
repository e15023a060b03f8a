import type { ConsoleColor } from '@conpane/core';

export const RESET = '\x1b[0m';
export const CLEAR_SCREEN = '\x1b[2J\x1b[H';
export const CLEAR_LINE = '\r\x1b[K';
export const HIDE_CURSOR = '\x1b[?25l';
export const SHOW_CURSOR = '\x1b[?25h';

const FOREGROUND: Record<ConsoleColor, string> = {
  black: '\x1b[30m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
};

const BACKGROUND: Record<ConsoleColor, string> = {
  black: '\x1b[40m',
  red: '\x1b[41m',
  green: '\x1b[42m',
  yellow: '\x1b[43m',
  blue: '\x1b[44m',
  magenta: '\x1b[45m',
  cyan: '\x1b[46m',
  white: '\x1b[47m',
  gray: '\x1b[100m',
};

export function colorize(text: string, foreground?: ConsoleColor, background?: ConsoleColor): string {
  if (!foreground && !background) return text;
  const fg = foreground ? FOREGROUND[foreground] : '';
  const bg = background ? BACKGROUND[background] : '';
  return fg + bg + text + RESET;
}

export function cursorLeft(count: number): string {
  return count > 0 ? `\x1b[${count}D` : '';
}

export function cursorRight(count: number): string {
  return count > 0 ? `\x1b[${count}C` : '';
}

/** OSC 0: sets the terminal window title. */
export function windowTitle(title: string): string {
  return `\x1b]0;${title}\x07`;
}
