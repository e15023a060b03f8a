import {
  HeadlessTextView,
  KeyProcessor,
  type ColorSpan,
  type Console,
  type Logger,
} from '@conpane/core';
import { CLEAR_LINE, CLEAR_SCREEN, colorize, cursorLeft, cursorRight } from './colors.js';
import { END_OF_INPUT, splitInput, toConsoleKey } from './keys.js';

/** The parts of `process.stdin` the view uses. */
export interface ConsoleInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  resume(): unknown;
  pause(): unknown;
  on(event: 'data', listener: (data: string) => void): unknown;
  off(event: 'data', listener: (data: string) => void): unknown;
}

/** The parts of `process.stdout` the view uses. */
export interface ConsoleOutput {
  columns?: number;
  write(data: string): boolean;
  on(event: 'resize', listener: () => void): unknown;
  off(event: 'resize', listener: () => void): unknown;
}

export interface NodeConsoleViewOptions {
  input?: ConsoleInput;
  output?: ConsoleOutput;
  /** Called on Ctrl+D. */
  onEndOfInput?: () => void;
  logger?: Pick<Logger, 'error'>;
}

const DEFAULT_COLUMNS = 80;

function lastLineStart(text: string): number {
  return Math.max(text.lastIndexOf('\n'), text.lastIndexOf('\r')) + 1;
}

function commonPrefixLength(a: string, b: string): number {
  const max = Math.min(a.length, b.length);
  let i = 0;
  while (i < max && a.charCodeAt(i) === b.charCodeAt(i)) i++;
  return i;
}

/**
 * Text view bridged to the host process's stdin/stdout.
 *
 * Puts stdin into raw mode and feeds every keypress to the console's key
 * processor. Output is rendered by diffing the buffer against what was last
 * written: appends go straight through, edits on the last line redraw that
 * line and anything else redraws the screen. Colour spans are dropped once
 * they end before the last line, which is the only line repainted in place.
 * One column is one unit of viewport width.
 */
export class NodeConsoleView extends HeadlessTextView {
  private input: ConsoleInput;
  private output: ConsoleOutput;
  private onEndOfInput: (() => void) | undefined;
  private keys: KeyProcessor | null = null;
  private colorSpans: ColorSpan[] = [];
  private rendered = '';
  private cursorBack = 0;
  private renderScheduled = false;
  private unsubscribe: Array<() => void> = [];

  constructor(options: NodeConsoleViewOptions = {}) {
    const output = options.output ?? process.stdout;
    super({ viewportWidth: output.columns || DEFAULT_COLUMNS, columnWidth: 1, logger: options.logger });
    this.input = options.input ?? process.stdin;
    this.output = output;
    this.onEndOfInput = options.onEndOfInput;

    this.unsubscribe.push(this.buffer.on('changed', () => this.scheduleRender()));
    this.output.on('resize', this.handleResize);
  }

  /** Routes keyboard input and colour output of `console` through this view. */
  attach(console: Console): void {
    this.keys = new KeyProcessor(console);
    this.unsubscribe.push(
      console.on('color-span', (span) => {
        this.colorSpans.push(span);
        this.scheduleRender();
      }),
      console.on('cleared', () => {
        this.colorSpans = [];
      }),
    );

    if (this.input.isTTY) {
      this.input.setRawMode?.(true);
    }
    this.input.setEncoding('utf-8');
    this.input.on('data', this.handleData);
    this.input.resume();
  }

  destroy(): void {
    for (const unsubscribe of this.unsubscribe) unsubscribe();
    this.unsubscribe = [];
    this.input.off('data', this.handleData);
    this.output.off('resize', this.handleResize);
    if (this.input.isTTY) {
      this.input.setRawMode?.(false);
    }
    this.input.pause();
  }

  private handleData = (data: string): void => {
    for (const chunk of splitInput(data)) {
      if (chunk === END_OF_INPUT) {
        this.onEndOfInput?.();
        continue;
      }
      const key = toConsoleKey(chunk);
      if (key && this.keys) this.keys.handle(key);
    }
    // Caret moves do not touch the buffer
    this.scheduleRender();
  };

  private handleResize = (): void => {
    this.setViewportWidth(this.output.columns || DEFAULT_COLUMNS);
  };

  private scheduleRender(): void {
    if (this.renderScheduled) return;
    this.renderScheduled = true;
    queueMicrotask(() => this.flush());
  }

  /** Colour spans kept for repainting the last line. */
  get colorSpanCount(): number {
    return this.colorSpans.length;
  }

  /** Writes whatever changed since the last render. */
  flush(): void {
    this.renderScheduled = false;
    const snapshot = this.buffer.currentSnapshot;
    const text = snapshot.getText();

    this.colorSpans = this.colorSpans
      .map((color) => ({ ...color, span: color.span.translateTo(snapshot, 'edge-exclusive') }))
      .filter((color) => !color.span.isEmpty);

    const caret = this.caret.position;
    const back = caret >= lastLineStart(text) ? text.length - caret : 0;
    if (text === this.rendered && back === this.cursorBack) return;

    let out = cursorRight(this.cursorBack);
    const common = commonPrefixLength(this.rendered, text);
    if (common === this.rendered.length) {
      out += this.paint(text, common);
    } else if (common >= lastLineStart(this.rendered)) {
      const from = lastLineStart(this.rendered);
      out += CLEAR_LINE + this.paint(text, from);
    } else {
      out += CLEAR_SCREEN + this.paint(text, 0);
    }

    out += cursorLeft(back);
    this.cursorBack = back;
    this.rendered = text;

    // Only the last line is ever repainted from its spans.
    const repaintFrom = lastLineStart(text);
    this.colorSpans = this.colorSpans.filter(
      (color) => color.span.span.start + color.span.span.length > repaintFrom,
    );

    if (out) this.output.write(out);
  }

  private paint(text: string, from: number): string {
    const spans = [...this.colorSpans].sort((a, b) => a.span.span.start - b.span.span.start);

    let out = '';
    let pos = from;
    for (const { span, foreground, background } of spans) {
      const start = Math.max(span.span.start, pos);
      const end = Math.min(span.span.start + span.span.length, text.length);
      if (start >= end) continue;
      out += text.slice(pos, start) + colorize(text.slice(start, end), foreground, background);
      pos = end;
    }
    return out + text.slice(pos);
  }
}
