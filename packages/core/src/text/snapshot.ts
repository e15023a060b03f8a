import { ConsoleError, ErrorCode } from '../errors.js';
import {
  createSpan,
  spanEnd,
  translatePosition,
  translateSpan,
  type PointTrackingMode,
  type Span,
  type SpanTrackingMode,
  type TextChange,
} from './types.js';

/**
 * One link in a buffer's version chain. Each version knows the change that
 * produced its successor, which is all point and span translation needs.
 */
export class TextVersion {
  readonly versionNumber: number;
  readonly length: number;
  private nextVersion: TextVersion | null = null;
  private nextChange: TextChange | null = null;

  constructor(versionNumber: number, length: number) {
    this.versionNumber = versionNumber;
    this.length = length;
  }

  get next(): { change: TextChange; version: TextVersion } | null {
    if (!this.nextVersion || !this.nextChange) return null;
    return { change: this.nextChange, version: this.nextVersion };
  }

  createNext(change: TextChange): TextVersion {
    const next = new TextVersion(
      this.versionNumber + 1,
      this.length - change.oldText.length + change.newText.length,
    );
    this.nextVersion = next;
    this.nextChange = change;
    return next;
  }
}

export interface LineExtent {
  /** Offset of the first character of the line. */
  start: number;
  /** Offset just past the last character, before the line break. */
  end: number;
  text: string;
}

function isLineBreak(ch: string | undefined): boolean {
  return ch === '\n' || ch === '\r';
}

function changesBetween(from: TextVersion, to: TextVersion): TextChange[] {
  if (to.versionNumber < from.versionNumber) {
    throw new ConsoleError(
      ErrorCode.EINVAL,
      `cannot translate from version ${from.versionNumber} back to ${to.versionNumber}`,
    );
  }
  const changes: TextChange[] = [];
  let version = from;
  while (version !== to) {
    const next = version.next;
    if (!next) {
      throw new ConsoleError(ErrorCode.EINVAL, `version ${to.versionNumber} is not reachable from ${from.versionNumber}`);
    }
    changes.push(next.change);
    version = next.version;
  }
  return changes;
}

/** Immutable view of the buffer text at one version. */
export class TextSnapshot {
  readonly version: TextVersion;
  private readonly text: string;

  constructor(version: TextVersion, text: string) {
    this.version = version;
    this.text = text;
  }

  get versionNumber(): number {
    return this.version.versionNumber;
  }

  get length(): number {
    return this.text.length;
  }

  get start(): SnapshotPoint {
    return new SnapshotPoint(this, 0);
  }

  get end(): SnapshotPoint {
    return new SnapshotPoint(this, this.text.length);
  }

  getText(span?: Span): string {
    if (!span) return this.text;
    return this.text.slice(span.start, spanEnd(span));
  }

  lineAt(position: number): LineExtent {
    if (position < 0 || position > this.text.length) {
      throw new ConsoleError(ErrorCode.EINVAL, `position ${position} is outside 0..${this.text.length}`);
    }
    // Between '\r' and '\n' still belongs to the line before the break.
    let start = this.text[position - 1] === '\r' && this.text[position] === '\n' ? position - 1 : position;
    let end = start;
    while (start > 0 && !isLineBreak(this.text[start - 1])) start--;
    while (end < this.text.length && !isLineBreak(this.text[end])) end++;
    return { start, end, text: this.text.slice(start, end) };
  }

  get lineCount(): number {
    return this.text.split(/\r\n|\r|\n/).length;
  }
}

export class SnapshotPoint {
  readonly snapshot: TextSnapshot;
  readonly position: number;

  constructor(snapshot: TextSnapshot, position: number) {
    if (position < 0 || position > snapshot.length) {
      throw new ConsoleError(ErrorCode.EINVAL, `position ${position} is outside 0..${snapshot.length}`);
    }
    this.snapshot = snapshot;
    this.position = position;
  }

  add(offset: number): SnapshotPoint {
    return new SnapshotPoint(this.snapshot, this.position + offset);
  }

  get containingLine(): LineExtent {
    return this.snapshot.lineAt(this.position);
  }

  translateTo(target: TextSnapshot, mode: PointTrackingMode): SnapshotPoint {
    if (target === this.snapshot) return this;
    let position = this.position;
    for (const change of changesBetween(this.snapshot.version, target.version)) {
      position = translatePosition(position, change, mode);
    }
    return new SnapshotPoint(target, position);
  }
}

export class SnapshotSpan {
  readonly snapshot: TextSnapshot;
  readonly span: Span;

  constructor(snapshot: TextSnapshot, span: Span) {
    if (span.length < 0 || span.start < 0 || spanEnd(span) > snapshot.length) {
      throw new ConsoleError(
        ErrorCode.EINVAL,
        `span ${span.start}+${span.length} is outside 0..${snapshot.length}`,
      );
    }
    this.snapshot = snapshot;
    this.span = span;
  }

  static fromPoints(start: SnapshotPoint, end: SnapshotPoint): SnapshotSpan {
    if (start.snapshot !== end.snapshot) {
      throw new ConsoleError(ErrorCode.EINVAL, 'span points belong to different snapshots');
    }
    return new SnapshotSpan(start.snapshot, createSpan(start.position, end.position - start.position));
  }

  get start(): SnapshotPoint {
    return new SnapshotPoint(this.snapshot, this.span.start);
  }

  get end(): SnapshotPoint {
    return new SnapshotPoint(this.snapshot, spanEnd(this.span));
  }

  get length(): number {
    return this.span.length;
  }

  get isEmpty(): boolean {
    return this.span.length === 0;
  }

  getText(): string {
    return this.snapshot.getText(this.span);
  }

  translateTo(target: TextSnapshot, mode: SpanTrackingMode): SnapshotSpan {
    if (target === this.snapshot) return this;
    let span = this.span;
    for (const change of changesBetween(this.snapshot.version, target.version)) {
      span = translateSpan(span, change, mode);
    }
    return new SnapshotSpan(target, span);
  }
}
