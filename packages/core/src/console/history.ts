import type { Logger } from '../config.js';

const DEFAULT_MAX_HISTORY = 200;

/** Submitted command lines in the order they were entered. */
export class InputHistory {
  private entries: string[] = [];
  private maxCount: number;

  constructor(maxCount = DEFAULT_MAX_HISTORY) {
    this.maxCount = maxCount;
  }

  add(line: string): void {
    if (!line) return;

    this.entries.push(line);

    // Trim to max
    if (this.entries.length > this.maxCount) {
      this.entries = this.entries.slice(-this.maxCount);
    }
  }

  get(index: number): string | undefined {
    return this.entries[index];
  }

  get history(): string[] {
    return [...this.entries];
  }

  get length(): number {
    return this.entries.length;
  }
}

/**
 * Up/Down recall over a copy of the history taken on the first navigation
 * after a reset. The cursor runs from -1 (before the oldest entry) to
 * `count` (the fresh, empty line); both ends resolve to an empty input.
 */
export class HistoryNavigator {
  private inputs: readonly string[] | null = null;
  private index = -1;
  private history: InputHistory;
  private replaceInput: (text: string) => void;
  private logger: Pick<Logger, 'debug'>;

  constructor(
    history: InputHistory,
    replaceInput: (text: string) => void,
    logger: Pick<Logger, 'debug'> = console,
  ) {
    this.history = history;
    this.replaceInput = replaceInput;
    this.logger = logger;
  }

  /** -1 while no navigation has happened since the last reset. */
  get currentIndex(): number {
    return this.inputs ? this.index : -1;
  }

  get isNavigating(): boolean {
    return this.inputs !== null;
  }

  reset(): void {
    this.inputs = null;
    this.index = -1;
  }

  /** Returns the recalled text, or undefined when the move was out of range. */
  navigate(offset: number): string | undefined {
    if (!this.inputs) {
      this.inputs = this.history.history;
      this.index = this.inputs.length;
    }

    const count = this.inputs.length;
    const next = this.index + offset;
    if (next < -1 || next > count) {
      this.logger.debug(`history: ignoring move to ${next} (range -1..${count})`);
      return undefined;
    }

    const input = next >= 0 && next < count ? this.inputs[next] ?? '' : '';
    // The cursor only moves once the input was actually replaced.
    this.replaceInput(input);
    this.index = next;
    return input;
  }
}
