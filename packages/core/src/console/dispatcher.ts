import { AsyncLocalStorage } from 'node:async_hooks';
import type { Logger } from '../config.js';
import { ConsoleError, ErrorCode } from '../errors.js';
import type { Console } from './Console.js';
import { MarshaledConsole } from './marshaler.js';
import type { ConsoleHost, PendingInputLine } from './types.js';

interface WorkItem {
  run(): void;
  reject(error: unknown): void;
}

/**
 * Single owner of the console's text surface.
 *
 * Work from outside the owner context is queued and run one unit per event
 * loop turn, in submission order, inside the owner context; the caller's
 * promise settles with the unit's result or its original error. Calls made
 * inside the owner context run inline. UI entry points enter the owner
 * context through `runAsOwner`.
 *
 * The dispatcher also feeds completed input lines to the host, one command
 * at a time, outside the owner context.
 */
export class ConsoleDispatcher {
  readonly marshaled: MarshaledConsole;
  private owner = new AsyncLocalStorage<boolean>();
  private queue: WorkItem[] = [];
  private drainHandle: NodeJS.Immediate | null = null;
  private disposed = false;

  private inputLines: PendingInputLine[] = [];
  private processing: Promise<void> | null = null;
  private startPromise: Promise<void> | null = null;
  private _isStartCompleted = false;
  private _isExecuting = false;

  private console: Console;
  private logger: Logger;

  constructor(console: Console, logger: Logger) {
    this.console = console;
    this.logger = logger;
    this.marshaled = new MarshaledConsole(this, console);
  }

  get isOwnerContext(): boolean {
    return this.owner.getStore() === true;
  }

  get isStartCompleted(): boolean {
    return this._isStartCompleted;
  }

  get isExecuting(): boolean {
    return this._isExecuting;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Number of units waiting for their turn. */
  get pendingCount(): number {
    return this.queue.length;
  }

  runAsOwner<T>(fn: () => T): T {
    return this.owner.run(true, fn);
  }

  invoke<T>(fn: () => T): Promise<T> {
    if (this.disposed) {
      return Promise.reject(new ConsoleError(ErrorCode.EDISPOSED, 'console dispatcher is disposed'));
    }
    if (this.isOwnerContext) {
      try {
        return Promise.resolve(fn());
      } catch (error) {
        return Promise.reject(error);
      }
    }
    return this.enqueue(fn);
  }

  /** Like invoke, but always waits for a queue turn, even in the owner context. */
  post<T>(fn: () => T): Promise<T> {
    if (this.disposed) {
      return Promise.reject(new ConsoleError(ErrorCode.EDISPOSED, 'console dispatcher is disposed'));
    }
    return this.enqueue(fn);
  }

  private enqueue<T>(fn: () => T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({ run: () => resolve(fn()), reject });
      this.scheduleDrain();
    });
  }

  private scheduleDrain(): void {
    if (this.drainHandle || this.queue.length === 0) return;
    this.drainHandle = setImmediate(() => {
      this.drainHandle = null;
      this.owner.run(true, () => this.runNext());
    });
  }

  private runNext(): void {
    const item = this.queue.shift();
    if (item) {
      try {
        item.run();
      } catch (error) {
        item.reject(error);
      }
    }
    this.scheduleDrain();
  }

  // ─── Input pipeline ───

  start(): Promise<void> {
    if (this.startPromise) return this.startPromise;

    const host = this.console.host;
    if (!host) {
      return Promise.reject(new ConsoleError(ErrorCode.ENOTSTARTED, 'console has no host to start'));
    }

    this.startPromise = this.owner.run(false, async () => {
      this.logger.debug(`console: starting host ${host.name}`);
      await host.initialize?.(this.marshaled);
      await this.promptForInput(host);
      this._isStartCompleted = true;
    });
    return this.startPromise;
  }

  /** Records the line in the history and queues it for the host. */
  postInputLine(line: PendingInputLine): void {
    if (this.disposed) {
      throw new ConsoleError(ErrorCode.EDISPOSED, 'console dispatcher is disposed');
    }
    this.console.inputHistory.add(line.text);
    this.inputLines.push(line);
    this.ensureProcessing();
  }

  /**
   * Clears the console at the next queue turn and starts a fresh input line.
   * Does nothing when no input line is open at that point (a command is
   * executing).
   */
  clearConsole(): Promise<void> {
    return this.post(() => {
      if (!this.console.inputLineStart) return;
      const host = this.console.host;
      this.console.clear();
      if (host) this.console.write(host.prompt);
      this.console.beginInputLine();
    });
  }

  /** Resolves once every posted input line has been executed. */
  async idle(): Promise<void> {
    while (this.processing) {
      await this.processing;
    }
  }

  private ensureProcessing(): void {
    if (this.processing || this.inputLines.length === 0) return;

    this.processing = this.owner
      .run(false, () => this.processInputLines())
      .catch((error: unknown) => {
        if (error instanceof ConsoleError && error.code === ErrorCode.EDISPOSED) {
          this.logger.debug('console: input pipeline stopped by dispose');
        } else {
          this.logger.error('console: input pipeline failed:', error);
        }
      })
      .finally(() => {
        this.processing = null;
        if (!this.disposed) this.ensureProcessing();
      });
  }

  private async processInputLines(): Promise<void> {
    const host = this.console.host;
    if (!host) {
      throw new ConsoleError(ErrorCode.ENOTSTARTED, 'console has no host to run input');
    }
    const target = this.marshaled;

    for (let line = this.inputLines.shift(); line; line = this.inputLines.shift()) {
      await target.writeLine('');
      await target.setExecutionMode(true);
      this._isExecuting = true;
      try {
        const handled = await host.execute(line.text, target);
        if (!handled) this.logger.debug(`console: ${host.name} did not handle "${line.text}"`);
      } catch (error) {
        this.logger.error(`console: ${host.name} failed to execute "${line.text}":`, error);
        const message = error instanceof Error ? error.message : String(error);
        await target.write(message, 'red');
        await target.writeLine('');
      } finally {
        this._isExecuting = false;
      }
      await target.setExecutionMode(false);
      await this.promptForInput(host);
    }
  }

  private promptForInput(host: ConsoleHost): Promise<void> {
    return this.invoke(() => {
      this.console.write(host.prompt);
      this.console.beginInputLine();
    });
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    if (this.drainHandle) {
      clearImmediate(this.drainHandle);
      this.drainHandle = null;
    }
    const pending = this.queue;
    this.queue = [];
    this.inputLines = [];
    for (const item of pending) {
      item.reject(new ConsoleError(ErrorCode.EDISPOSED, 'console dispatcher was disposed before the call ran'));
    }
    this.logger.debug('console: dispatcher disposed');
  }
}
