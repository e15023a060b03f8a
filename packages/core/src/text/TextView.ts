import type { Logger } from '../config.js';
import { EventBus, type EventHandler } from '../events/EventBus.js';
import { TextBuffer, type ITextBuffer } from './TextBuffer.js';
import { translatePosition } from './types.js';

export type MarginName = 'left' | 'right';

export interface TextViewMargin {
  enabled: boolean;
  /** Width in the same unit as the viewport. */
  size: number;
}

export interface Caret {
  readonly position: number;
  moveTo(position: number): void;
  /** Scrolls the view so the caret is on screen. */
  ensureVisible(): void;
}

export interface TextViewEvents {
  'viewport-width-changed': { width: number };
  'zoom-level-changed': { zoomLevel: number };
  'caret-visible': { position: number };
}

export interface ITextView {
  readonly buffer: ITextBuffer;
  readonly caret: Caret;
  readonly viewportWidth: number;
  /** Average width of one formatted character column. */
  readonly columnWidth: number;
  readonly zoomLevel: number;
  /** Opaque handle for whatever displays the view. */
  readonly hostControl: unknown;
  getMargin(name: MarginName): TextViewMargin | undefined;
  on<K extends keyof TextViewEvents>(event: K, handler: EventHandler<TextViewEvents[K]>): () => void;
}

export interface HeadlessTextViewOptions {
  buffer?: ITextBuffer;
  viewportWidth?: number;
  columnWidth?: number;
  margins?: Partial<Record<MarginName, TextViewMargin>>;
  hostControl?: unknown;
  logger?: Pick<Logger, 'error'>;
}

class HeadlessCaret implements Caret {
  private _position = 0;

  constructor(
    private readonly buffer: ITextBuffer,
    private readonly events: EventBus<TextViewEvents>,
  ) {
    buffer.on('changed', ({ change }) => {
      this._position = translatePosition(this._position, change, 'positive');
    });
  }

  get position(): number {
    return this._position;
  }

  moveTo(position: number): void {
    const length = this.buffer.currentSnapshot.length;
    this._position = Math.min(Math.max(position, 0), length);
  }

  ensureVisible(): void {
    this.events.emit('caret-visible', { position: this._position });
  }
}

/**
 * A text view without any rendering. Geometry is whatever the embedder
 * sets; the caret follows edits like an editor caret does.
 * Used for headless consoles, the terminal front end and tests.
 */
export class HeadlessTextView implements ITextView {
  readonly buffer: ITextBuffer;
  readonly caret: Caret;
  readonly hostControl: unknown;
  private _viewportWidth: number;
  private _columnWidth: number;
  private _zoomLevel = 100;
  private margins: Partial<Record<MarginName, TextViewMargin>>;
  private events: EventBus<TextViewEvents>;

  constructor(options: HeadlessTextViewOptions = {}) {
    const logger = options.logger ?? console;
    this.buffer = options.buffer ?? new TextBuffer('', logger);
    this._viewportWidth = options.viewportWidth ?? 640;
    this._columnWidth = options.columnWidth ?? 8;
    this.margins = { ...options.margins };
    this.hostControl = options.hostControl ?? null;
    this.events = new EventBus<TextViewEvents>(logger);

    this.caret = new HeadlessCaret(this.buffer, this.events);
  }

  get viewportWidth(): number {
    return this._viewportWidth;
  }

  get columnWidth(): number {
    return this._columnWidth;
  }

  get zoomLevel(): number {
    return this._zoomLevel;
  }

  getMargin(name: MarginName): TextViewMargin | undefined {
    return this.margins[name];
  }

  on<K extends keyof TextViewEvents>(event: K, handler: EventHandler<TextViewEvents[K]>): () => void {
    return this.events.on(event, handler);
  }

  setViewportWidth(width: number): void {
    if (width === this._viewportWidth) return;
    this._viewportWidth = width;
    this.events.emit('viewport-width-changed', { width });
  }

  setZoomLevel(zoomLevel: number, columnWidth = this._columnWidth): void {
    this._zoomLevel = zoomLevel;
    this._columnWidth = columnWidth;
    this.events.emit('zoom-level-changed', { zoomLevel });
  }

  setMargin(name: MarginName, margin: TextViewMargin | undefined): void {
    this.margins[name] = margin;
  }
}
