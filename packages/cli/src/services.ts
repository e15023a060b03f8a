import type { ConsoleServices } from '@conpane/core';
import { HIDE_CURSOR, SHOW_CURSOR, windowTitle } from './colors.js';
import type { ConsoleOutput } from './NodeConsoleView.js';

/**
 * Host services backed by the terminal: progress goes to the window title,
 * the busy state hides the cursor.
 */
export function createTerminalServices(output: Pick<ConsoleOutput, 'write'>, title: string): ConsoleServices {
  return {
    statusBar: {
      progress(inProgress, label, complete, total) {
        const text = inProgress ? `${title} - ${label} ${Math.round((complete * 100) / total)}%` : title;
        output.write(windowTitle(text));
      },
    },
    consoleStatus: {
      setBusyState(busy) {
        output.write(busy ? HIDE_CURSOR : SHOW_CURSOR);
      },
    },
  };
}
