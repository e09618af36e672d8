import { describe, it, expect } from 'vitest';
import { HistoryBuffer } from '../../src/history-buffer';

describe('HistoryBuffer', () => {
  it('reads slot 0 and writes slot 1 initially', () => {
    const history = new HistoryBuffer('a', 'b');
    expect(history.read(0)).toBe('a');
    expect(history.write(0)).toBe('b');
    expect(history.read(1)).toBe('a');
  });

  it('swaps one view without touching the other', () => {
    const history = new HistoryBuffer('a', 'b');
    history.swap(0);
    expect(history.read(0)).toBe('b');
    expect(history.write(0)).toBe('a');
    expect(history.read(1)).toBe('a');
    expect(history.writeIndex(1)).toBe(1);
  });

  it('never reads and writes the same slot', () => {
    const history = new HistoryBuffer('a', 'b');
    for (let frame = 0; frame < 5; frame++) {
      expect(history.readIndex(0)).not.toBe(history.writeIndex(0));
      expect(history.readIndex(1)).not.toBe(history.writeIndex(1));
      history.swap(0);
      if (frame % 2 === 0) history.swap(1);
    }
  });
});
