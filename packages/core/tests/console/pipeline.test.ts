import { describe, it, expect, afterEach } from 'vitest';
import { Console } from '../../src/console/Console.js';
import { KeyProcessor } from '../../src/console/key-processor.js';
import type { ColorSpan, ConsoleHost } from '../../src/console/types.js';
import { SnapshotSpan } from '../../src/text/snapshot.js';
import { HeadlessTextView } from '../../src/text/TextView.js';
import { createSpan } from '../../src/text/types.js';
import { createFakeHost, createSilentLogger, createTestConsole } from '../helpers.js';

describe('input pipeline', () => {
  const consoles: Console[] = [];

  function setup(host: ConsoleHost = createFakeHost()) {
    const t = createTestConsole(host);
    consoles.push(t.con);
    return { ...t, keys: new KeyProcessor(t.con, t.logger) };
  }

  function typeLine(keys: KeyProcessor, line: string): void {
    keys.handle({ name: 'text', text: line });
    keys.handle({ name: 'enter' });
  }

  afterEach(() => {
    for (const con of consoles.splice(0)) con.dispose();
  });

  it('writes the prompt and opens an input line on start', async () => {
    const { con, text } = setup();

    await con.dispatcher.start();

    expect(text()).toBe('PM> ');
    expect(con.isComposing).toBe(true);
    expect(con.dispatcher.isStartCompleted).toBe(true);
  });

  it('starts only once', async () => {
    const { con, text } = setup();
    const first = con.dispatcher.start();
    expect(con.dispatcher.start()).toBe(first);
    await first;
    expect(text()).toBe('PM> ');
  });

  it('lets the host write a banner before the first prompt', async () => {
    const host: ConsoleHost = {
      ...createFakeHost(),
      initialize: async (console) => {
        await console.writeLine('Welcome');
      },
    };
    const { con, text } = setup(host);

    await con.dispatcher.start();

    expect(text()).toBe('Welcome\nPM> ');
  });

  it('cannot start without a host', async () => {
    const logger = createSilentLogger();
    const con = new Console({ view: new HeadlessTextView({ logger }), options: { logger } });
    consoles.push(con);

    await expect(con.dispatcher.start()).rejects.toMatchObject({ code: 'ENOTSTARTED' });
  });

  it('runs a typed command and prompts again', async () => {
    const host = createFakeHost(async (command, console) => {
      await console.writeLine(`ran ${command}`);
      return true;
    });
    const { con, keys, text, consoleStatus, uiShell } = setup(host);
    await con.dispatcher.start();

    typeLine(keys, 'list packages');
    await con.dispatcher.idle();

    expect(text()).toBe('PM> list packages\nran list packages\nPM> ');
    expect(host.execute).toHaveBeenCalledWith('list packages', con.marshaledConsole);
    expect(consoleStatus.setBusyState.mock.calls).toEqual([[true], [false]]);
    expect(uiShell.updateCommandUI).toHaveBeenCalledWith(false);
    expect(con.isComposing).toBe(true);
    expect(con.dispatcher.isExecuting).toBe(false);
  });

  it('runs commands one at a time in the order they were entered', async () => {
    const order: string[] = [];
    const host = createFakeHost(async (command) => {
      order.push(`start ${command}`);
      await new Promise((resolve) => setImmediate(resolve));
      order.push(`end ${command}`);
      return true;
    });
    const { con, keys } = setup(host);
    await con.dispatcher.start();

    typeLine(keys, 'one');
    con.dispatcher.postInputLine({
      span: new SnapshotSpan(con.buffer.currentSnapshot, createSpan(0, 0)),
      text: 'two',
    });
    await con.dispatcher.idle();

    expect(order).toEqual(['start one', 'end one', 'start two', 'end two']);
    expect(con.inputHistory.history).toEqual(['one', 'two']);
  });

  it('logs commands the host did not handle', async () => {
    const host = createFakeHost(async () => false);
    const { con, keys, logger } = setup(host);
    await con.dispatcher.start();

    typeLine(keys, 'bogus');
    await con.dispatcher.idle();

    expect(logger.debug).toHaveBeenCalledWith('console: test-host did not handle "bogus"');
  });

  it('writes a failing command error in red and keeps going', async () => {
    const failure = new Error('boom');
    const host = createFakeHost(async () => {
      throw failure;
    });
    const { con, keys, text, logger } = setup(host);
    const spans: ColorSpan[] = [];
    con.on('color-span', (span) => spans.push(span));
    await con.dispatcher.start();

    typeLine(keys, 'bad');
    await con.dispatcher.idle();

    expect(text()).toBe('PM> bad\nboom\nPM> ');
    expect(spans).toHaveLength(1);
    expect(spans[0]?.span.getText()).toBe('boom');
    expect(spans[0]?.foreground).toBe('red');
    expect(logger.error).toHaveBeenCalledWith('console: test-host failed to execute "bad":', failure);
    expect(con.isComposing).toBe(true);
  });

  it('recalls executed commands with the arrow keys', async () => {
    const { con, keys, text } = setup();
    await con.dispatcher.start();
    typeLine(keys, 'first');
    await con.dispatcher.idle();

    keys.handle({ name: 'up' });

    expect(text()).toBe('PM> first\nPM> first');
    expect(con.inputLineText).toBe('first');
  });

  it('abandons the typed line on interrupt', async () => {
    const { con, keys, text, host } = setup();
    await con.dispatcher.start();

    keys.handle({ name: 'text', text: 'abc' });
    keys.handle({ name: 'interrupt' });
    await con.dispatcher.idle();

    expect(text()).toBe('PM> abc^C\nPM> ');
    expect(con.isComposing).toBe(true);
    expect(host.execute).not.toHaveBeenCalled();
    expect(con.inputHistory.length).toBe(0);
  });

  it('clears the screen and prompts again while composing', async () => {
    const { con, keys, text } = setup();
    let cleared = 0;
    con.on('cleared', () => cleared++);
    await con.dispatcher.start();
    keys.handle({ name: 'text', text: 'half' });

    await con.clearConsole();

    expect(text()).toBe('PM> ');
    expect(cleared).toBe(1);
    expect(con.isComposing).toBe(true);
    expect(con.inputLineText).toBe('');
  });

  it('ignores clear requests while a command runs', async () => {
    const { con, text } = setup();
    con.write('output');

    await con.clearConsole();

    expect(text()).toBe('output');
  });
});
