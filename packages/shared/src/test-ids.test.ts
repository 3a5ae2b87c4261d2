import { describe, it, expect } from 'vitest';
import {
  normalizeTestIds,
  uniqueTestIds,
  encodeTestIdForLog,
} from './test-ids';
import { InvalidTestSpecError } from './errors';

describe('normalizeTestIds', () => {
  it('normalizes a bracket-wrapped string and a list identically', () => {
    expect(normalizeTestIds('[a::b, c::d]')).toEqual(['a::b', 'c::d']);
    expect(normalizeTestIds(['a::b', 'c::d'])).toEqual(['a::b', 'c::d']);
  });

  it('splits a plain comma-separated string', () => {
    expect(normalizeTestIds('a::b,c::d')).toEqual(['a::b', 'c::d']);
  });

  it('drops empty pieces and surrounding whitespace', () => {
    expect(normalizeTestIds('  [a::b,, c::d , ]  ')).toEqual(['a::b', 'c::d']);
    expect(normalizeTestIds('')).toEqual([]);
    expect(normalizeTestIds('[]')).toEqual([]);
  });

  it('accepts JSON arrays of strings', () => {
    expect(normalizeTestIds('["tests/test_x.py::test_a[1,2]", "tests/test_x.py::test_b"]')).toEqual(
      ['tests/test_x.py::test_a[1,2]', 'tests/test_x.py::test_b'],
    );
  });

  it('strips matching quotes from delimited pieces', () => {
    expect(normalizeTestIds("['a::b', 'c::d']")).toEqual(['a::b', 'c::d']);
  });

  it('keeps list entries untouched, including duplicates', () => {
    expect(normalizeTestIds(['a::b', ' a::b', 'a::b'])).toEqual(['a::b', ' a::b', 'a::b']);
  });

  it('rejects lists with non-string entries', () => {
    expect(() => normalizeTestIds(['a::b', 3])).toThrow(
      'Test identifier at index 1 is a number, expected a string',
    );
  });

  it('rejects unrecognized shapes', () => {
    for (const bad of [42, null, undefined, { a: 1 }, true]) {
      expect(() => normalizeTestIds(bad)).toThrow(InvalidTestSpecError);
    }
    expect(() => normalizeTestIds(null)).toThrow(
      'Unrecognized test specification: expected a list or a delimited string, got null',
    );
  });
});

describe('uniqueTestIds', () => {
  it('keeps first-occurrence order', () => {
    expect(uniqueTestIds(['b', 'a', 'b', 'c', 'a'])).toEqual(['b', 'a', 'c']);
  });
});

describe('encodeTestIdForLog', () => {
  it('encodes structural separators', () => {
    expect(encodeTestIdForLog('tests/test_a.py::TestX::test_y[1-2]')).toBe(
      'tests%2Ftest_a.py%3A%3ATestX%3A%3Atest_y%5B1-2%5D',
    );
  });

  it('keeps safe characters as they are', () => {
    expect(encodeTestIdForLog('test_plain-1.2')).toBe('test_plain-1.2');
  });

  it('encodes non-ASCII characters byte by byte', () => {
    expect(encodeTestIdForLog('t::é')).toBe('t%3A%3A%C3%A9');
  });

  it('does not collide for identifiers that differ only in separators', () => {
    const ids = ['a::b', 'a__b', 'a/b', 'a%3A%3Ab', 'a[b]', 'a_b_'];
    const encoded = new Set(ids.map(encodeTestIdForLog));
    expect(encoded.size).toBe(ids.length);
  });

  it('encodes the percent sign itself', () => {
    expect(encodeTestIdForLog('t[a%b]')).toBe('t%5Ba%25b%5D');
  });
});
