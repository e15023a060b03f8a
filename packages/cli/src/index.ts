/**
 * conpane CLI entry point
 *
 *   conpane [--prompt <text>] [--history-size <n>] [--minimum-width <n>] [--debug]
 *
 * Runs the demo host in the current terminal. Ctrl+D or `exit` quits.
 * Diagnostics go to stderr; `--debug` includes debug messages.
 */

import { Console as LogConsole } from 'node:console';
import { Console, type Logger } from '@conpane/core';
import { DemoHost } from './DemoHost.js';
import { NodeConsoleView } from './NodeConsoleView.js';
import { parseArgs } from './args.js';
import { createTerminalServices } from './services.js';
import { SHOW_CURSOR, windowTitle } from './colors.js';

function createLogger(debug: boolean): Logger {
  const stderr = new LogConsole({ stdout: process.stderr, stderr: process.stderr });
  return {
    debug: (message, ...args) => {
      if (debug) stderr.debug(message, ...args);
    },
    info: (message, ...args) => stderr.info(message, ...args),
    warn: (message, ...args) => stderr.warn(message, ...args),
    error: (message, ...args) => stderr.error(message, ...args),
  };
}

async function main(): Promise<void> {
  const opts = parseArgs(process.argv.slice(2));
  const logger = createLogger(opts.debug ?? false);
  const title = 'conpane';

  const view = new NodeConsoleView({ logger, onEndOfInput: () => shutdown(0) });
  const con = new Console({
    view,
    services: createTerminalServices(process.stdout, title),
    options: {
      logger,
      historySize: opts.historySize,
      minimumWidth: opts.minimumWidth,
    },
  });
  con.host = new DemoHost({ prompt: opts.prompt, onExit: () => shutdown(0) });

  function shutdown(code: number): void {
    con.dispose();
    view.destroy();
    process.stdout.write(SHOW_CURSOR + windowTitle('') + '\r\n');
    process.exit(code);
  }

  view.attach(con);
  process.stdout.write(windowTitle(title));
  await con.dispatcher.start();
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
