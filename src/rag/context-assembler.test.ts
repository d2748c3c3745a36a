import { compactWhitespace, fitToBudget, formatLabelledChunks, sampleEvenly, snippet } from './context-assembler.js';

describe('sampleEvenly', () => {
  const items = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

  it('should include the first and last items and space the rest evenly', () => {
    expect(sampleEvenly(items, 4)).toEqual([0, 3, 6, 9]);
    expect(sampleEvenly(items, 3)).toEqual([0, 5, 9]);
  });

  it('should return everything when asked for at least as many items', () => {
    expect(sampleEvenly(items, 10)).toEqual(items);
    expect(sampleEvenly([1, 2], 5)).toEqual([1, 2]);
  });

  it('should handle edge counts', () => {
    expect(sampleEvenly(items, 1)).toEqual([0]);
    expect(sampleEvenly(items, 0)).toEqual([]);
    expect(sampleEvenly([], 3)).toEqual([]);
  });
});

describe('compactWhitespace', () => {
  it('should collapse runs of whitespace', () => {
    expect(compactWhitespace('  Hello\n\n  world\t! ')).toBe('Hello world !');
  });
});

describe('formatLabelledChunks', () => {
  it('should label each chunk with its index', () => {
    expect(
      formatLabelledChunks([
        { index: 2, text: 'Hello\n\nworld' },
        { index: 5, text: 'Second' },
      ])
    ).toBe('[Chunk 2]\nHello world\n\n[Chunk 5]\nSecond');
  });
});

describe('fitToBudget', () => {
  it('should take whole excerpts until the budget is used', () => {
    expect(fitToBudget(['aaaa', 'bbbb', 'cccc'], 15, ' | ')).toBe('aaaa | bbbb');
  });

  it('should truncate a first excerpt that alone exceeds the budget', () => {
    expect(fitToBudget(['abcdefghij', 'klm'], 4)).toBe('abcd');
  });
});

describe('snippet', () => {
  it('should keep short text', () => {
    expect(snippet('Water boils at 100°C at sea level.')).toBe('Water boils at 100°C at sea level.');
  });

  it('should shorten long text', () => {
    expect(snippet('a'.repeat(200))).toBe(`${'a'.repeat(150)}...`);
  });
});
