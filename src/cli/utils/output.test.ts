import { describe, it, expect } from 'vitest';
import { formatValue, formatCollectionChanges, formatMapChanges } from './output.js';
import { CollectionDiffer } from '../../change-detection/collection-differ.js';
import { MapDiffer } from '../../change-detection/map-differ.js';

describe('formatValue', () => {
  it('renders values as JSON', () => {
    expect(formatValue('a')).toBe('"a"');
    expect(formatValue(3)).toBe('3');
    expect(formatValue(null)).toBe('null');
    expect(formatValue(undefined)).toBe('undefined');
  });
});

describe('formatCollectionChanges', () => {
  const record = new CollectionDiffer<unknown>(['a', 'b', 'c']).check(['c', 'a', 'd']);

  it('lists additions, moves and removals under a summary', () => {
    expect(formatCollectionChanges(record, {})).toBe(
      [
        '1 addition(s), 1 move(s), 1 removal(s)',
        '  + "d" at 2',
        '  ~ "c" 2 -> 0',
        '  - "b" from 1',
      ].join('\n')
    );
  });

  it('outputs JSON when requested', () => {
    const parsed: unknown = JSON.parse(formatCollectionChanges(record, { json: true }));

    expect(parsed).toEqual({
      summary: '1 addition(s), 1 move(s), 1 removal(s)',
      additions: [{ previousIndex: null, currentIndex: 2, item: 'd' }],
      moves: [{ previousIndex: 2, currentIndex: 0, item: 'c' }],
      removals: [{ previousIndex: 1, currentIndex: null, item: 'b' }],
    });
  });

  it('prints only the summary when nothing changed', () => {
    const unchanged = new CollectionDiffer<unknown>([1]).check([1]);

    expect(formatCollectionChanges(unchanged, {})).toBe('No changes');
  });
});

describe('formatMapChanges', () => {
  const record = new MapDiffer<unknown>({ a: 1, b: 2 }).check({ a: 10, c: 3 });

  it('lists changes, additions and removals under a summary', () => {
    expect(formatMapChanges(record, {})).toBe(
      [
        '1 change(s), 1 addition(s), 1 removal(s)',
        '  ~ a: 1 -> 10',
        '  + c: 3',
        '  - b: 2',
      ].join('\n')
    );
  });

  it('outputs JSON when requested', () => {
    const parsed: unknown = JSON.parse(formatMapChanges(record, { json: true }));

    expect(parsed).toEqual({
      summary: '1 change(s), 1 addition(s), 1 removal(s)',
      changes: [{ key: 'a', previousValue: 1, currentValue: 10 }],
      additions: [{ key: 'c', currentValue: 3 }],
      removals: [{ key: 'b', previousValue: 2 }],
    });
  });
});
