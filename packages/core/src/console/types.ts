import type { SnapshotSpan } from '../text/snapshot.js';
import type { ReadOnlyRegion } from '../text/TextBuffer.js';

export type ReadOnlyRegionMode =
  /** No read-only region; the whole buffer accepts edits. */
  | 'none'
  /** Everything written so far is locked; only appending after it is allowed. */
  | 'begin-and-body'
  /** The whole buffer is locked, including insertion at either end. */
  | 'all';

export interface RegionLockState {
  readonly mode: ReadOnlyRegionMode;
  readonly begin?: ReadOnlyRegion;
  readonly body?: ReadOnlyRegion;
}

export type ConsoleColor =
  | 'black'
  | 'red'
  | 'green'
  | 'yellow'
  | 'blue'
  | 'magenta'
  | 'cyan'
  | 'white'
  | 'gray';

export interface ColorSpan {
  span: SnapshotSpan;
  foreground?: ConsoleColor;
  background?: ConsoleColor;
}

/** A completed command line on its way to the host. */
export interface PendingInputLine {
  readonly span: SnapshotSpan;
  readonly text: string;
}

export interface ConsoleEvents {
  'color-span': ColorSpan;
  cleared: void;
}

// ─── Services of the hosting application (all optional) ───

export interface IStatusBar {
  progress(inProgress: boolean, label: string, complete: number, total: number): void;
}

export interface IConsoleStatus {
  setBusyState(busy: boolean): void;
}

export interface IUIShell {
  /** Asks the application to refresh command state; `immediate` false defers it. */
  updateCommandUI(immediate: boolean): void;
}

export interface ConsoleServices {
  statusBar?: IStatusBar;
  consoleStatus?: IConsoleStatus;
  uiShell?: IUIShell;
}

/**
 * What the command host sees. Every member may be called from outside the
 * owner context; results arrive once the console has run the call.
 */
export interface IConsole {
  readonly consoleWidth: Promise<number>;
  write(text: string, foreground?: ConsoleColor, background?: ConsoleColor): Promise<void>;
  writeLine(text: string): Promise<void>;
  writeBackspace(): Promise<void>;
  writeProgress(operation: string, percentComplete: number): Promise<void>;
  setExecutionMode(isExecuting: boolean): Promise<void>;
  clear(): Promise<void>;
  getHistory(): Promise<string[]>;
  readonly content: Promise<unknown>;
}

/** Parses and runs submitted command lines. */
export interface ConsoleHost {
  readonly name: string;
  /** Written before every input line. */
  readonly prompt: string;
  initialize?(console: IConsole): Promise<void> | void;
  /** Resolves to false when the command was not recognised. */
  execute(command: string, console: IConsole): Promise<boolean>;
}
