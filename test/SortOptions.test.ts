import { describe, expect, it } from 'vitest';
import type { Entry } from '../src/common/Types';
import { sortByExpiry, sortByKey, sortByValue, sortWith } from '../src/storage/sort';

function entry(key: string, value: string, expiry: number): Entry {
  return { key, value: Buffer.from(value), expiry: new Date(expiry) };
}

describe('SortOptions', () => {
  it('should sort by key lexicographically', () => {
    const entries = [entry('b', '', 0), entry('B', '', 0), entry('a', '', 0)];

    sortByKey(entries);

    expect(entries.map(e => e.key)).toEqual(['B', 'a', 'b']);
  });

  it('should order keys by UTF-8 bytes rather than UTF-16 code units', () => {
    const entries = [entry('\u{10000}', '', 0), entry('\uFFFF', '', 0), entry('z', '', 0)];

    sortByKey(entries);

    expect(entries.map(e => e.key)).toEqual(['z', '\uFFFF', '\u{10000}']);
  });

  it('should sort by raw value bytes', () => {
    const entries = [
      { key: 'x', value: Buffer.from([0xff]), expiry: new Date(0) },
      { key: 'y', value: Buffer.from([0x01, 0x02]), expiry: new Date(0) },
      { key: 'z', value: Buffer.from([0x01]), expiry: new Date(0) },
    ];

    sortByValue(entries);

    expect(entries.map(e => e.key)).toEqual(['z', 'y', 'x']);
  });

  it('should keep the relative order of equal expiries', () => {
    const entries = [
      entry('late', '', 300),
      entry('first-tie', '', 100),
      entry('second-tie', '', 100),
      entry('third-tie', '', 100),
    ];

    sortByExpiry(entries);

    expect(entries.map(e => e.key)).toEqual(['first-tie', 'second-tie', 'third-tie', 'late']);
  });

  it('should build an option from a custom comparator', () => {
    const entries = [entry('a', '', 1), entry('b', '', 2)];

    sortWith((x, y) => y.expiry.getTime() - x.expiry.getTime())(entries);

    expect(entries.map(e => e.key)).toEqual(['b', 'a']);
  });
});
