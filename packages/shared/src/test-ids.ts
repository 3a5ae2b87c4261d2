import { InvalidTestSpecError } from './errors';
import type { TestIdentifier } from './types/harness';

/**
 * Normalizes a test-identifier collection into an ordered list.
 *
 * Accepts a list of strings (returned unchanged, duplicates kept) or a single
 * delimited string: `"a::b,c::d"`, `"[a::b, c::d]"` or a JSON array of strings.
 *
 * @throws InvalidTestSpecError for any other shape
 */
export function normalizeTestIds(input: unknown): TestIdentifier[] {
  if (Array.isArray(input)) {
    return input.map((item, index) => {
      if (typeof item !== 'string') {
        throw new InvalidTestSpecError(
          `Test identifier at index ${index} is a ${describeType(item)}, expected a string`,
        );
      }
      return item;
    });
  }

  if (typeof input === 'string') {
    return parseDelimited(input);
  }

  throw new InvalidTestSpecError(
    `Unrecognized test specification: expected a list or a delimited string, got ${describeType(input)}`,
  );
}

function parseDelimited(raw: string): TestIdentifier[] {
  let s = raw.trim();

  const fromJson = tryParseJsonList(s);
  if (fromJson) return fromJson;

  if (s.startsWith('[') && s.endsWith(']')) {
    s = s.slice(1, -1);
  }

  return s
    .split(',')
    .map((piece) => stripQuotes(piece.trim()))
    .filter((piece) => piece.length > 0);
}

function tryParseJsonList(s: string): TestIdentifier[] | undefined {
  if (!s.startsWith('[')) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(s);
  } catch {
    return undefined;
  }
  if (!Array.isArray(parsed)) return undefined;
  const ids: TestIdentifier[] = [];
  for (const item of parsed) {
    if (typeof item !== 'string') return undefined;
    ids.push(item);
  }
  return ids;
}

function stripQuotes(piece: string): string {
  if (piece.length >= 2) {
    const first = piece[0];
    const last = piece[piece.length - 1];
    if ((first === "'" || first === '"') && first === last) {
      return piece.slice(1, -1).trim();
    }
  }
  return piece;
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Returns the distinct identifiers of `ids`, keeping first-occurrence order.
 */
export function uniqueTestIds(ids: readonly TestIdentifier[]): TestIdentifier[] {
  return [...new Set(ids)];
}

const SAFE_LOG_CHAR = /[A-Za-z0-9._-]/;

/**
 * Maps a test identifier to a file name stem that is safe on every filesystem.
 *
 * Characters outside `[A-Za-z0-9._-]` are percent-encoded byte by byte (`::` becomes
 * `%3A%3A`, `/` becomes `%2F`), so the mapping is stable and two different
 * identifiers never share a log file.
 */
export function encodeTestIdForLog(testId: TestIdentifier): string {
  let out = '';
  for (const char of testId) {
    if (SAFE_LOG_CHAR.test(char)) {
      out += char;
      continue;
    }
    for (const byte of Buffer.from(char, 'utf8')) {
      out += '%' + byte.toString(16).toUpperCase().padStart(2, '0');
    }
  }
  return out;
}
