import { resolveOptions, type ConsoleOptions, type Logger, type ResolvedConsoleOptions } from '../config.js';
import { ConsoleError, ErrorCode } from '../errors.js';
import { EventBus, type EventHandler } from '../events/EventBus.js';
import { SnapshotSpan, type SnapshotPoint } from '../text/snapshot.js';
import type { ITextBuffer } from '../text/TextBuffer.js';
import type { ITextView } from '../text/TextView.js';
import { createSpan, spanFromBounds } from '../text/types.js';
import { ConsoleDispatcher } from './dispatcher.js';
import { HistoryNavigator, InputHistory } from './history.js';
import { InputLineTracker } from './input-line.js';
import type { MarshaledConsole } from './marshaler.js';
import { UNLOCKED, setRegionLockMode } from './regions.js';
import type {
  ConsoleColor,
  ConsoleEvents,
  ConsoleHost,
  ConsoleServices,
  ReadOnlyRegionMode,
  RegionLockState,
} from './types.js';

/** Property key under which a console registers itself on its buffer. */
export const CONSOLE_OWNER = Symbol.for('conpane.console-owner');

export interface ConsoleInit {
  view: ITextView;
  services?: ConsoleServices;
  options?: ConsoleOptions;
}

/**
 * Console engine over a text view.
 *
 * Output mode: the whole buffer is read-only and every write unlocks it for
 * the duration of the edit. Input mode: everything before the input line
 * start is read-only and the tail is open for typing.
 *
 * All members must be used in the owner context; other callers go through
 * `marshaledConsole`.
 */
export class Console {
  readonly view: ITextView;
  readonly inputHistory: InputHistory;
  readonly dispatcher: ConsoleDispatcher;
  private options: ResolvedConsoleOptions;
  private services: ConsoleServices;
  private logger: Logger;
  private events: EventBus<ConsoleEvents>;
  private lock: RegionLockState = UNLOCKED;
  private input: InputLineTracker;
  private navigator: HistoryNavigator;
  private _host: ConsoleHost | undefined;
  private _consoleWidth = -1;
  private subscriptions: Array<() => void>;
  private disposed = false;

  constructor(init: ConsoleInit) {
    this.options = resolveOptions(init.options);
    this.logger = this.options.logger;
    this.view = init.view;
    this.services = init.services ?? {};
    this.events = new EventBus<ConsoleEvents>(this.logger);
    this.inputHistory = new InputHistory(this.options.historySize);
    this.dispatcher = new ConsoleDispatcher(this, this.logger);

    this.input = new InputLineTracker({
      buffer: this.buffer,
      setReadOnlyMode: (mode) => this.setReadOnlyMode(mode),
      resetHistory: () => this.navigator.reset(),
      postInputLine: (line) => this.dispatcher.postInputLine(line),
    });
    this.navigator = new HistoryNavigator(
      this.inputHistory,
      (text) => this.replaceAllInput(text),
      this.logger,
    );

    this.buffer.properties.set(CONSOLE_OWNER, this);

    // Locked until the first input line begins.
    this.setReadOnlyMode('all');

    this.subscriptions = [
      this.view.on('viewport-width-changed', () => this.resetConsoleWidth()),
      this.view.on('zoom-level-changed', () => this.resetConsoleWidth()),
    ];
  }

  get buffer(): ITextBuffer {
    return this.view.buffer;
  }

  get host(): ConsoleHost | undefined {
    return this._host;
  }

  set host(value: ConsoleHost | undefined) {
    if (this._host) {
      throw new ConsoleError(ErrorCode.EHOSTSET, 'console host can only be set once');
    }
    this._host = value;
  }

  get marshaledConsole(): MarshaledConsole {
    return this.dispatcher.marshaled;
  }

  get readOnlyMode(): ReadOnlyRegionMode {
    return this.lock.mode;
  }

  /** The element the hosting window displays. */
  get content(): unknown {
    return this.view.hostControl;
  }

  on<K extends keyof ConsoleEvents>(event: K, handler: EventHandler<ConsoleEvents[K]>): () => void {
    return this.events.on(event, handler);
  }

  private setReadOnlyMode(mode: ReadOnlyRegionMode): void {
    this.lock = setRegionLockMode(this.buffer, this.lock, mode);
  }

  // ─── Input line ───

  get inputLineStart(): SnapshotPoint | undefined {
    return this.input.inputLineStart;
  }

  get isComposing(): boolean {
    return this.input.isComposing;
  }

  beginInputLine(): void {
    this.input.beginInputLine();
  }

  endInputLine(isEcho = false): SnapshotSpan | undefined {
    return this.input.endInputLine(isEcho);
  }

  getInputLineExtent(offset = 0, length = -1): SnapshotSpan {
    return this.input.getInputLineExtent(offset, length);
  }

  get inputLineExtent(): SnapshotSpan {
    return this.input.inputLineExtent;
  }

  get allInputExtent(): SnapshotSpan {
    return this.input.allInputExtent;
  }

  get inputLineText(): string {
    return this.input.inputLineText;
  }

  /** Recalls history into the open input line; undefined while idle. */
  navigateHistory(offset: number): string | undefined {
    if (!this.input.isComposing) return undefined;
    return this.navigator.navigate(offset);
  }

  private replaceAllInput(text: string): void {
    const extent = this.input.allInputExtent;
    if (!this.buffer.replace(extent.span, text)) {
      throw new ConsoleError(ErrorCode.EREADONLY, 'input line is not editable');
    }
    this.view.caret.ensureVisible();
  }

  // ─── Output ───

  get consoleWidth(): number {
    if (this._consoleWidth < 0) {
      let marginSize = 0;
      for (const name of ['left', 'right'] as const) {
        const margin = this.view.getMargin(name);
        if (margin?.enabled) marginSize += margin.size;
      }
      const columns = Math.floor((this.view.viewportWidth - marginSize) / this.view.columnWidth);
      const minimum = this.options.minimumWidth;
      this._consoleWidth = Number.isFinite(columns) ? Math.max(minimum, columns) : minimum;
    }
    return this._consoleWidth;
  }

  private resetConsoleWidth(): void {
    this._consoleWidth = -1;
  }

  /**
   * Appends text at the end of the buffer. With a colour, publishes a
   * `color-span` event covering what the buffer actually grew by.
   */
  write(text: string, foreground?: ConsoleColor, background?: ConsoleColor): void {
    const begin = this.buffer.currentSnapshot.length;
    this.editUnlocked(() => {
      if (!this.buffer.insert(this.buffer.currentSnapshot.length, text)) {
        throw new ConsoleError(ErrorCode.EREADONLY, 'end of the console buffer is read-only');
      }
    });

    if (foreground || background) {
      const snapshot = this.buffer.currentSnapshot;
      this.events.emit('color-span', {
        span: new SnapshotSpan(snapshot, spanFromBounds(begin, snapshot.length)),
        foreground,
        background,
      });
    }
  }

  writeLine(text: string): void {
    this.write(text + this.options.newLine);
  }

  /** Removes the last character of the buffer; false when nothing was removed. */
  writeBackspace(): boolean {
    let removed = false;
    this.editUnlocked(() => {
      const length = this.buffer.currentSnapshot.length;
      if (length > 0) {
        removed = this.buffer.delete(createSpan(length - 1, 1));
      }
    });
    return removed;
  }

  private editUnlocked(edit: () => void): void {
    // Idle output mode: unlock for the edit and lock again afterwards.
    const idle = !this.input.isComposing;
    if (idle) this.setReadOnlyMode('none');
    try {
      edit();
      this.view.caret.ensureVisible();
    } finally {
      if (idle) this.setReadOnlyMode('all');
    }
  }

  writeProgress(operation: string, percentComplete: number): void {
    if (!operation) {
      throw new ConsoleError(ErrorCode.EINVAL, 'writeProgress needs an operation label');
    }
    const percent = Number.isNaN(percentComplete)
      ? 0
      : Math.min(Math.max(Math.trunc(percentComplete), 0), 100);

    if (percent === 100) {
      this.hideProgress();
      return;
    }
    const statusBar = this.services.statusBar;
    if (!statusBar) {
      this.logger.debug(`console: no status bar for progress "${operation}" ${percent}%`);
      return;
    }
    statusBar.progress(true, operation, percent, 100);
  }

  hideProgress(): void {
    this.services.statusBar?.progress(false, '', 100, 100);
  }

  setExecutionMode(isExecuting: boolean): void {
    this.services.consoleStatus?.setBusyState(isExecuting);

    if (!isExecuting) {
      this.hideProgress();
      this.services.uiShell?.updateCommandUI(false);
    }
  }

  /**
   * Removes all text and drops any input line without submitting it. The
   * buffer is left unlocked until the next write or input line.
   */
  clear(): void {
    this.setReadOnlyMode('none');
    const snapshot = this.buffer.currentSnapshot;
    this.buffer.delete(createSpan(0, snapshot.length));

    this.input.abandon();
    this.navigator.reset();

    this.events.emit('cleared', undefined);
  }

  /** Clears from the keyboard; deferred to the dispatcher, and only while composing. */
  clearConsole(): Promise<void> {
    if (!this.input.isComposing) return Promise.resolve();
    return this.dispatcher.clearConsole();
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    for (const unsubscribe of this.subscriptions) unsubscribe();
    this.subscriptions = [];
    if (this.buffer.properties.get(CONSOLE_OWNER) === this) {
      this.buffer.properties.delete(CONSOLE_OWNER);
    }
    this.dispatcher.dispose();
  }
}
