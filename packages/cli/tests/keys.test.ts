import { describe, it, expect } from 'vitest';
import { splitInput, toConsoleKey } from '../src/keys.js';

describe('splitInput', () => {
  it('splits batched keypresses and keeps escape sequences whole', () => {
    expect(splitInput('ab\x1b[A\x1bOP\x1bx\x03')).toEqual(['ab', '\x1b[A', '\x1bOP', '\x1bx', '\x03']);
  });

  it('keeps a pasted line together up to its line break', () => {
    expect(splitInput('echo héllo\rls')).toEqual(['echo héllo', '\r', 'ls']);
  });

  it('tells a lone escape from one that starts a sequence', () => {
    expect(splitInput('\x1b\x1b[A')).toEqual(['\x1b', '\x1b[A']);
    expect(splitInput('\x1b\x1b')).toEqual(['\x1b', '\x1b']);
  });

  it('keeps parameters of CSI sequences', () => {
    expect(splitInput('\x1b[3~\x1b[1;5C')).toEqual(['\x1b[3~', '\x1b[1;5C']);
  });

  it('keeps a lone escape', () => {
    expect(splitInput('\x1b')).toEqual(['\x1b']);
  });
});

describe('toConsoleKey', () => {
  it('maps editing keys', () => {
    expect(toConsoleKey('\r')).toEqual({ name: 'enter' });
    expect(toConsoleKey('\x7f')).toEqual({ name: 'backspace' });
    expect(toConsoleKey('\x1b[3~')).toEqual({ name: 'delete' });
    expect(toConsoleKey('\x1b[A')).toEqual({ name: 'up' });
    expect(toConsoleKey('\x1bOH')).toEqual({ name: 'home' });
    expect(toConsoleKey('\x1b')).toEqual({ name: 'escape' });
    expect(toConsoleKey('\x03')).toEqual({ name: 'interrupt' });
    expect(toConsoleKey('\x0c')).toEqual({ name: 'clear-screen' });
  });

  it('maps printable characters to text', () => {
    expect(toConsoleKey('x')).toEqual({ name: 'text', text: 'x' });
    expect(toConsoleKey(' ')).toEqual({ name: 'text', text: ' ' });
    expect(toConsoleKey('list packages')).toEqual({ name: 'text', text: 'list packages' });
    expect(toConsoleKey('constructor')).toEqual({ name: 'text', text: 'constructor' });
  });

  it('ignores other control keys and sequences', () => {
    expect(toConsoleKey('\x02')).toBeUndefined();
    expect(toConsoleKey('\x1bx')).toBeUndefined();
    expect(toConsoleKey('\x1b[1;5C')).toBeUndefined();
  });
});
