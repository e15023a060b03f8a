import type { Logger } from '../config.js';
import { ConsoleError, ErrorCode } from '../errors.js';
import { EventBus, type EventHandler } from '../events/EventBus.js';
import { TextSnapshot, TextVersion } from './snapshot.js';
import {
  createSpan,
  spanEnd,
  spansOverlap,
  translateSpan,
  type EdgeInsertionMode,
  type Span,
  type SpanTrackingMode,
  type TextChange,
} from './types.js';

export interface ReadOnlyRegion {
  readonly id: number;
  /** Extent in the current snapshot. */
  readonly span: Span;
  readonly trackingMode: SpanTrackingMode;
  readonly edgeInsertionMode: EdgeInsertionMode;
}

export interface ReadOnlyRegionEdit {
  createReadOnlyRegion(
    span: Span,
    trackingMode?: SpanTrackingMode,
    edgeInsertionMode?: EdgeInsertionMode,
  ): ReadOnlyRegion;
  clearReadOnlyRegion(region: ReadOnlyRegion | undefined): void;
}

export interface TextChangedEvent {
  before: TextSnapshot;
  after: TextSnapshot;
  change: TextChange;
}

export interface TextBufferEvents {
  changed: TextChangedEvent;
  'read-only-regions-changed': { regions: readonly ReadOnlyRegion[] };
}

export interface ITextBuffer {
  readonly currentSnapshot: TextSnapshot;
  readonly readOnlyRegions: readonly ReadOnlyRegion[];
  /** Free-form attachments, e.g. the console that owns the buffer. */
  readonly properties: Map<string | symbol, unknown>;

  /** Each edit returns false, leaving the buffer untouched, when a read-only region forbids it. */
  insert(position: number, text: string): boolean;
  delete(span: Span): boolean;
  replace(span: Span, text: string): boolean;

  isReadOnly(span: Span): boolean;
  canInsert(position: number): boolean;

  /**
   * Opens a read-only region edit session. Changes made through `edit`
   * are committed together when `fn` returns and dropped when it throws.
   */
  editReadOnlyRegions<T>(fn: (edit: ReadOnlyRegionEdit) => T): T;

  on<K extends keyof TextBufferEvents>(event: K, handler: EventHandler<TextBufferEvents[K]>): () => void;
}

class TrackedRegion implements ReadOnlyRegion {
  span: Span;

  constructor(
    readonly id: number,
    span: Span,
    readonly trackingMode: SpanTrackingMode,
    readonly edgeInsertionMode: EdgeInsertionMode,
  ) {
    this.span = span;
  }

  blocksRemoval(span: Span): boolean {
    return span.length > 0 && spansOverlap(this.span, span);
  }

  blocksInsertion(position: number): boolean {
    const start = this.span.start;
    const end = spanEnd(this.span);
    if (start < position && position < end) return true;
    return this.edgeInsertionMode === 'deny' && (position === start || position === end);
  }
}

/** In-memory text buffer with versioned snapshots and read-only regions. */
export class TextBuffer implements ITextBuffer {
  readonly properties = new Map<string | symbol, unknown>();
  private snapshot: TextSnapshot;
  private regions: TrackedRegion[] = [];
  private nextRegionId = 1;
  private editOpen = false;
  private events: EventBus<TextBufferEvents>;

  constructor(initialText = '', logger: Pick<Logger, 'error'> = console) {
    this.snapshot = new TextSnapshot(new TextVersion(0, initialText.length), initialText);
    this.events = new EventBus<TextBufferEvents>(logger);
  }

  get currentSnapshot(): TextSnapshot {
    return this.snapshot;
  }

  get readOnlyRegions(): readonly ReadOnlyRegion[] {
    return [...this.regions];
  }

  on<K extends keyof TextBufferEvents>(event: K, handler: EventHandler<TextBufferEvents[K]>): () => void {
    return this.events.on(event, handler);
  }

  insert(position: number, text: string): boolean {
    return this.applyChange(createSpan(position, 0), text);
  }

  delete(span: Span): boolean {
    return this.applyChange(span, '');
  }

  replace(span: Span, text: string): boolean {
    return this.applyChange(span, text);
  }

  isReadOnly(span: Span): boolean {
    if (span.length === 0) return !this.canInsert(span.start);
    return this.regions.some((region) => region.blocksRemoval(span));
  }

  canInsert(position: number): boolean {
    return !this.regions.some((region) => region.blocksInsertion(position));
  }

  editReadOnlyRegions<T>(fn: (edit: ReadOnlyRegionEdit) => T): T {
    if (this.editOpen) {
      throw new ConsoleError(ErrorCode.EINVAL, 'a read-only region edit is already open');
    }
    this.editOpen = true;

    const created: TrackedRegion[] = [];
    const cleared = new Set<number>();
    const length = this.snapshot.length;
    const edit: ReadOnlyRegionEdit = {
      createReadOnlyRegion: (span, trackingMode = 'edge-exclusive', edgeInsertionMode = 'allow') => {
        if (span.start < 0 || span.length < 0 || spanEnd(span) > length) {
          throw new ConsoleError(ErrorCode.EINVAL, `region ${span.start}+${span.length} is outside 0..${length}`);
        }
        const region = new TrackedRegion(this.nextRegionId++, span, trackingMode, edgeInsertionMode);
        created.push(region);
        return region;
      },
      clearReadOnlyRegion: (region) => {
        if (region) cleared.add(region.id);
      },
    };

    try {
      const result = fn(edit);
      // Committed only when fn returned normally.
      this.regions = [...this.regions, ...created].filter((region) => !cleared.has(region.id));
      this.events.emit('read-only-regions-changed', { regions: this.readOnlyRegions });
      return result;
    } finally {
      this.editOpen = false;
    }
  }

  private applyChange(span: Span, newText: string): boolean {
    const before = this.snapshot;
    if (span.start < 0 || span.length < 0 || spanEnd(span) > before.length) {
      throw new ConsoleError(ErrorCode.EINVAL, `edit ${span.start}+${span.length} is outside 0..${before.length}`);
    }
    if (span.length === 0 && newText.length === 0) return true;
    if (this.regions.some((region) => region.blocksRemoval(span))) return false;
    if (newText.length > 0 && this.regions.some((region) => region.blocksInsertion(span.start))) return false;

    const change: TextChange = {
      position: span.start,
      oldText: before.getText(span),
      newText,
    };
    const text = before.getText();
    const after = new TextSnapshot(
      before.version.createNext(change),
      text.slice(0, span.start) + newText + text.slice(spanEnd(span)),
    );
    this.snapshot = after;
    for (const region of this.regions) {
      region.span = translateSpan(region.span, change, region.trackingMode);
    }
    this.events.emit('changed', { before, after, change });
    return true;
  }
}
