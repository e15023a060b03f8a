import { vi } from 'vitest';
import { Console } from '../src/console/Console.js';
import type { ConsoleHost, IConsole } from '../src/console/types.js';
import { HeadlessTextView } from '../src/text/TextView.js';

export function createSilentLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function createFakeHost(
  execute: (command: string, console: IConsole) => Promise<boolean> = async () => true,
): ConsoleHost {
  return {
    name: 'test-host',
    prompt: 'PM> ',
    execute: vi.fn(execute),
  };
}

export function createTestConsole(host: ConsoleHost = createFakeHost()) {
  const logger = createSilentLogger();
  const view = new HeadlessTextView({ viewportWidth: 800, columnWidth: 8, logger });
  const statusBar = { progress: vi.fn() };
  const consoleStatus = { setBusyState: vi.fn() };
  const uiShell = { updateCommandUI: vi.fn() };
  const con = new Console({
    view,
    services: { statusBar, consoleStatus, uiShell },
    options: { logger, newLine: '\n' },
  });
  con.host = host;

  return {
    con,
    view,
    buffer: view.buffer,
    host,
    logger,
    statusBar,
    consoleStatus,
    uiShell,
    text: () => view.buffer.currentSnapshot.getText(),
  };
}
