import type { Console } from './Console.js';
import type { ConsoleDispatcher } from './dispatcher.js';
import type { ConsoleColor, IConsole } from './types.js';

/**
 * The console as seen from outside the owner context. Each member is a
 * closure handed to the dispatcher, so it runs inline in the owner context
 * and queued everywhere else.
 */
export class MarshaledConsole implements IConsole {
  private dispatcher: ConsoleDispatcher;
  private console: Console;

  constructor(dispatcher: ConsoleDispatcher, console: Console) {
    this.dispatcher = dispatcher;
    this.console = console;
  }

  get consoleWidth(): Promise<number> {
    return this.dispatcher.invoke(() => this.console.consoleWidth);
  }

  get content(): Promise<unknown> {
    return this.dispatcher.invoke(() => this.console.content);
  }

  write(text: string, foreground?: ConsoleColor, background?: ConsoleColor): Promise<void> {
    return this.dispatcher.invoke(() => this.console.write(text, foreground, background));
  }

  writeLine(text: string): Promise<void> {
    return this.dispatcher.invoke(() => this.console.writeLine(text));
  }

  async writeBackspace(): Promise<void> {
    await this.dispatcher.invoke(() => this.console.writeBackspace());
  }

  writeProgress(operation: string, percentComplete: number): Promise<void> {
    return this.dispatcher.invoke(() => this.console.writeProgress(operation, percentComplete));
  }

  setExecutionMode(isExecuting: boolean): Promise<void> {
    return this.dispatcher.invoke(() => this.console.setExecutionMode(isExecuting));
  }

  clear(): Promise<void> {
    return this.dispatcher.invoke(() => this.console.clear());
  }

  getHistory(): Promise<string[]> {
    return this.dispatcher.invoke(() => this.console.inputHistory.history);
  }

  // Editing-layer members, for callers that drive input from outside.

  beginInputLine(): Promise<void> {
    return this.dispatcher.invoke(() => this.console.beginInputLine());
  }

  endInputLine(isEcho = false): Promise<string | undefined> {
    return this.dispatcher.invoke(() => this.console.endInputLine(isEcho)?.getText());
  }

  get inputLineStart(): Promise<number | undefined> {
    return this.dispatcher.invoke(() => this.console.inputLineStart?.position);
  }
}
