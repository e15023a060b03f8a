import { ConsoleError, ErrorCode } from '../errors.js';
import { SnapshotPoint, SnapshotSpan } from '../text/snapshot.js';
import type { ITextBuffer } from '../text/TextBuffer.js';
import { createSpan, spanFromBounds } from '../text/types.js';
import type { PendingInputLine, ReadOnlyRegionMode } from './types.js';

export interface InputLineTrackerOptions {
  buffer: ITextBuffer;
  setReadOnlyMode(mode: ReadOnlyRegionMode): void;
  resetHistory(): void;
  /** Receives every completed line that was typed rather than echoed. */
  postInputLine(line: PendingInputLine): void;
}

/**
 * Tracks the line being composed. Idle while `inputLineStart` is undefined,
 * composing otherwise; the start point is re-anchored to the current
 * snapshot on every read and never moves forward for text inserted at it.
 */
export class InputLineTracker {
  private start: SnapshotPoint | null = null;
  private options: InputLineTrackerOptions;

  constructor(options: InputLineTrackerOptions) {
    this.options = options;
  }

  get inputLineStart(): SnapshotPoint | undefined {
    if (!this.start) return undefined;
    const snapshot = this.options.buffer.currentSnapshot;
    if (this.start.snapshot !== snapshot) {
      this.start = this.start.translateTo(snapshot, 'negative');
    }
    return this.start;
  }

  get isComposing(): boolean {
    return this.start !== null;
  }

  beginInputLine(): void {
    if (this.start) return;
    this.options.setReadOnlyMode('begin-and-body');
    this.start = this.options.buffer.currentSnapshot.end;
  }

  endInputLine(isEcho = false): SnapshotSpan | undefined {
    this.options.resetHistory();

    if (!this.start) return undefined;

    const inputSpan = this.inputLineExtent;
    this.start = null;
    this.options.setReadOnlyMode('all');
    if (!isEcho) {
      this.options.postInputLine({ span: inputSpan, text: inputSpan.getText() });
    }
    return inputSpan;
  }

  /** Drops the line being composed without submitting it. */
  abandon(): void {
    this.start = null;
  }

  /**
   * Extent from `offset` characters past the input start; runs to the end of
   * that line unless `length` is given.
   */
  getInputLineExtent(offset = 0, length = -1): SnapshotSpan {
    const start = this.inputLineStart;
    if (!start) {
      throw new ConsoleError(ErrorCode.ENOINPUT, 'no input line is being composed');
    }
    const begin = start.add(offset);
    if (length >= 0) {
      return new SnapshotSpan(begin.snapshot, createSpan(begin.position, length));
    }
    return new SnapshotSpan(begin.snapshot, spanFromBounds(begin.position, begin.containingLine.end));
  }

  get inputLineExtent(): SnapshotSpan {
    return this.getInputLineExtent();
  }

  /**
   * From the input start to the end of the buffer. Normally the same as
   * `inputLineExtent`; differs when someone wrote several lines into the tail
   * while input was open.
   */
  get allInputExtent(): SnapshotSpan {
    const start = this.inputLineStart;
    if (!start) {
      throw new ConsoleError(ErrorCode.ENOINPUT, 'no input line is being composed');
    }
    return SnapshotSpan.fromPoints(start, start.snapshot.end);
  }

  get inputLineText(): string {
    return this.inputLineExtent.getText();
  }
}
