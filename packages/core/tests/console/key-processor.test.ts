import { describe, it, expect, afterEach } from 'vitest';
import type { Console } from '../../src/console/Console.js';
import { KeyProcessor, getConsoleOwner } from '../../src/console/key-processor.js';
import { TextBuffer } from '../../src/text/TextBuffer.js';
import { createTestConsole } from '../helpers.js';

describe('KeyProcessor', () => {
  const consoles: Console[] = [];

  function setup({ compose = true } = {}) {
    const t = createTestConsole();
    consoles.push(t.con);
    if (compose) {
      t.con.write('PM> ');
      t.con.beginInputLine();
    }
    return { ...t, keys: new KeyProcessor(t.con, t.logger) };
  }

  afterEach(() => {
    for (const con of consoles.splice(0)) con.dispose();
  });

  it('inserts typed text at the caret', () => {
    const { keys, view, text } = setup();

    keys.handle({ name: 'text', text: 'ac' });
    keys.handle({ name: 'left' });
    keys.handle({ name: 'text', text: 'b' });

    expect(text()).toBe('PM> abc');
    expect(view.caret.position).toBe(6);
  });

  it('moves the caret to the end before typing into the prompt', () => {
    const { keys, view, text } = setup();
    view.caret.moveTo(1);

    keys.handle({ name: 'text', text: 'x' });

    expect(text()).toBe('PM> x');
  });

  it('keeps the caret inside the input line', () => {
    const { keys, view } = setup();
    keys.handle({ name: 'text', text: 'ab' });

    keys.handle({ name: 'home' });
    keys.handle({ name: 'left' });
    expect(view.caret.position).toBe(4);

    keys.handle({ name: 'end' });
    keys.handle({ name: 'right' });
    expect(view.caret.position).toBe(6);
  });

  it('deletes backwards but never into the prompt', () => {
    const { keys, text } = setup();
    keys.handle({ name: 'text', text: 'ab' });

    keys.handle({ name: 'backspace' });
    expect(text()).toBe('PM> a');

    keys.handle({ name: 'home' });
    keys.handle({ name: 'backspace' });
    expect(text()).toBe('PM> a');
  });

  it('deletes forwards inside the input line only', () => {
    const { keys, text } = setup();
    keys.handle({ name: 'text', text: 'ab' });

    keys.handle({ name: 'home' });
    keys.handle({ name: 'delete' });
    expect(text()).toBe('PM> b');

    keys.handle({ name: 'end' });
    keys.handle({ name: 'delete' });
    expect(text()).toBe('PM> b');
  });

  it('wipes the input on escape', () => {
    const { con, keys, text } = setup();
    keys.handle({ name: 'text', text: 'draft' });

    keys.handle({ name: 'escape' });

    expect(text()).toBe('PM> ');
    expect(con.isComposing).toBe(true);
  });

  it('submits the whole line on enter wherever the caret is', () => {
    const { con, keys } = setup();
    keys.handle({ name: 'text', text: 'run it' });
    keys.handle({ name: 'home' });

    expect(keys.handle({ name: 'enter' })).toBe(true);

    expect(con.isComposing).toBe(false);
    expect(con.inputHistory.history).toEqual(['run it']);
  });

  it('does not consume keys while no input line is open', () => {
    const { keys, text } = setup({ compose: false });

    expect(keys.handle({ name: 'text', text: 'x' })).toBe(false);
    expect(keys.handle({ name: 'enter' })).toBe(false);
    expect(text()).toBe('');
  });

  it('clears the screen through the dispatcher', async () => {
    const { con, keys, text } = setup();
    keys.handle({ name: 'text', text: 'half' });

    expect(keys.handle({ name: 'clear-screen' })).toBe(true);
    expect(text()).toBe('PM> half');

    await con.dispatcher.invoke(() => undefined);
    expect(text()).toBe('PM> ');
  });
});

describe('getConsoleOwner', () => {
  it('finds the console registered on a buffer', () => {
    const { con, buffer } = createTestConsole();
    expect(getConsoleOwner(buffer)).toBe(con);
    con.dispose();
    expect(getConsoleOwner(buffer)).toBeUndefined();
  });

  it('finds nothing on a plain buffer', () => {
    expect(getConsoleOwner(new TextBuffer())).toBeUndefined();
  });
});
