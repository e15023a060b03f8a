import { describe, it, expect, vi } from 'vitest';
import { HistoryNavigator, InputHistory } from '../../src/console/history.js';
import { createSilentLogger } from '../helpers.js';

describe('InputHistory', () => {
  it('keeps lines in order, duplicates included', () => {
    const history = new InputHistory();
    history.add('a');
    history.add('b');
    history.add('a');
    expect(history.history).toEqual(['a', 'b', 'a']);
    expect(history.get(1)).toBe('b');
  });

  it('ignores empty lines but keeps whitespace-only ones', () => {
    const history = new InputHistory();
    history.add('');
    history.add('   ');
    expect(history.history).toEqual(['   ']);
  });

  it('drops the oldest entries past the limit', () => {
    const history = new InputHistory(2);
    history.add('one');
    history.add('two');
    history.add('three');
    expect(history.history).toEqual(['two', 'three']);
  });

  it('hands out copies', () => {
    const history = new InputHistory();
    history.add('a');
    history.history.push('b');
    expect(history.length).toBe(1);
  });
});

describe('HistoryNavigator', () => {
  function setup(lines: string[]) {
    const history = new InputHistory();
    for (const line of lines) history.add(line);
    const replaceInput = vi.fn();
    const logger = createSilentLogger();
    const navigator = new HistoryNavigator(history, replaceInput, logger);
    return { history, navigator, replaceInput, logger };
  }

  it('walks back through the log and past its oldest entry to an empty line', () => {
    const { navigator, replaceInput } = setup(['a', 'b']);

    expect(navigator.navigate(-1)).toBe('b');
    expect(navigator.navigate(-1)).toBe('a');
    expect(navigator.navigate(-1)).toBe('');
    expect(navigator.navigate(-1)).toBeUndefined();

    expect(replaceInput.mock.calls.map((call) => call[0])).toEqual(['b', 'a', '']);
    expect(navigator.currentIndex).toBe(-1);
  });

  it('walks forward again to the fresh empty line', () => {
    const { navigator } = setup(['a', 'b']);
    navigator.navigate(-1);
    navigator.navigate(-1);
    navigator.navigate(-1);

    expect(navigator.navigate(1)).toBe('a');
    expect(navigator.navigate(1)).toBe('b');
    expect(navigator.navigate(1)).toBe('');
    expect(navigator.navigate(1)).toBeUndefined();
    expect(navigator.currentIndex).toBe(2);
  });

  it('ignores moving forward from the fresh line', () => {
    const { navigator, replaceInput, logger } = setup(['a']);

    expect(navigator.navigate(1)).toBeUndefined();
    expect(replaceInput).not.toHaveBeenCalled();
    expect(logger.debug).toHaveBeenCalledWith('history: ignoring move to 2 (range -1..1)');
  });

  it('ignores lines added after navigation began until reset', () => {
    const { history, navigator } = setup(['a']);
    navigator.navigate(-1);
    history.add('b');

    expect(navigator.navigate(1)).toBe('');
    navigator.reset();
    expect(navigator.isNavigating).toBe(false);
    expect(navigator.navigate(-1)).toBe('b');
  });

  it('keeps the cursor where it was when replacing the input fails', () => {
    const { navigator, replaceInput } = setup(['a', 'b', 'c']);
    replaceInput.mockImplementationOnce(() => {
      throw new Error('input is read-only');
    });

    expect(() => navigator.navigate(-1)).toThrow('input is read-only');
    expect(navigator.currentIndex).toBe(3);
    expect(navigator.navigate(-1)).toBe('c');
  });

  it('recalls an empty line from an empty log', () => {
    const { navigator } = setup([]);
    expect(navigator.navigate(-1)).toBe('');
    expect(navigator.navigate(-1)).toBeUndefined();
  });
});
