import type { Logger } from '../config.js';
import type { ITextBuffer } from '../text/TextBuffer.js';
import { createSpan } from '../text/types.js';
import { CONSOLE_OWNER, Console } from './Console.js';

export type ConsoleKey =
  | {
      name:
        | 'enter'
        | 'up'
        | 'down'
        | 'left'
        | 'right'
        | 'home'
        | 'end'
        | 'backspace'
        | 'delete'
        | 'escape'
        | 'interrupt'
        | 'clear-screen';
    }
  | { name: 'text'; text: string };

/** The console registered on a buffer, if any. */
export function getConsoleOwner(buffer: ITextBuffer): Console | undefined {
  const owner = buffer.properties.get(CONSOLE_OWNER);
  return owner instanceof Console ? owner : undefined;
}

/**
 * Turns keystrokes into console edits. Only the open input line is ever
 * touched; keys arriving while no input line is open are not consumed.
 */
export class KeyProcessor {
  private console: Console;
  private logger: Pick<Logger, 'error'>;

  constructor(console: Console, logger: Pick<Logger, 'error'> = globalThis.console) {
    this.console = console;
    this.logger = logger;
  }

  /** Runs in the console's owner context. Returns whether the key was consumed. */
  handle(key: ConsoleKey): boolean {
    return this.console.dispatcher.runAsOwner(() => this.process(key));
  }

  private process(key: ConsoleKey): boolean {
    const start = this.console.inputLineStart;
    if (!start) return false;

    const buffer = this.console.buffer;
    const caret = this.console.view.caret;
    const end = buffer.currentSnapshot.length;

    switch (key.name) {
      case 'text':
        return this.insertText(key.text, start.position);

      case 'enter':
        caret.moveTo(end);
        this.console.endInputLine(false);
        return true;

      case 'up':
        this.console.navigateHistory(-1);
        return true;

      case 'down':
        this.console.navigateHistory(1);
        return true;

      case 'left':
        caret.moveTo(Math.max(start.position, caret.position - 1));
        return true;

      case 'right':
        caret.moveTo(Math.min(end, caret.position + 1));
        return true;

      case 'home':
        caret.moveTo(start.position);
        return true;

      case 'end':
        caret.moveTo(end);
        return true;

      case 'backspace':
        if (caret.position <= start.position) return true;
        buffer.delete(createSpan(caret.position - 1, 1));
        return true;

      case 'delete':
        if (caret.position < start.position || caret.position >= end) return true;
        buffer.delete(createSpan(caret.position, 1));
        return true;

      case 'escape':
        buffer.replace(this.console.allInputExtent.span, '');
        return true;

      case 'interrupt': {
        // Abandon the typed text: end it as an echo so the host never sees it.
        caret.moveTo(end);
        this.console.endInputLine(true);
        this.console.writeLine('^C');
        this.console.write(this.console.host?.prompt ?? '');
        this.console.beginInputLine();
        return true;
      }

      case 'clear-screen':
        this.console.clearConsole().catch((error: unknown) => {
          this.logger.error('console: clear failed:', error);
        });
        return true;
    }
    return false;
  }

  private insertText(text: string, inputStart: number): boolean {
    const buffer = this.console.buffer;
    const caret = this.console.view.caret;
    if (caret.position < inputStart) {
      caret.moveTo(buffer.currentSnapshot.length);
    }
    if (!buffer.canInsert(caret.position)) return false;
    return buffer.insert(caret.position, text);
  }
}
