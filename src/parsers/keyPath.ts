import type { KeyPath, PathSegment } from '../types/path';
import { MAX_ARRAY_INDEX } from '../types/path';
import { splitCsvLine } from './csvLine';

const DIGITS = /^[0-9]+$/;

function toSegment(token: string): PathSegment {
  if (!DIGITS.test(token)) {
    return token;
  }
  const index = Number(token);
  return index <= MAX_ARRAY_INDEX ? index : token;
}

/**
 * Parse a path that is already in `/a/b/0` form.
 * Reference tokens are unescaped the JSON Pointer way (~1 is '/', ~0 is '~').
 */
function parsePointer(raw: string): KeyPath {
  return raw
    .slice(1)
    .split('/')
    .map(token => toSegment(token.replace(/~1/g, '/').replace(/~0/g, '~')));
}

/**
 * Convert one raw header field into a structural path.
 *
 * `.` and `[` separate segments, `].` collapses into a single separator and
 * any other `]` is dropped, so `signal[0]`, `signal.0` and `/signal/0` all
 * compile to ['signal', 0]. Digit-only segments up to MAX_ARRAY_INDEX become
 * array indices.
 */
export function normalizeKeyPath(raw: string): KeyPath {
  if (raw.startsWith('/')) {
    return parsePointer(raw);
  }

  const tokens: string[] = [];
  let current = '';

  for (let i = 0; i < raw.length; i++) {
    const char = raw[i];

    if (char === ']') {
      if (raw[i + 1] === '.') {
        tokens.push(current);
        current = '';
        i++;
      }
    } else if (char === '.' || char === '[') {
      tokens.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  tokens.push(current);

  return tokens.map(toSegment);
}

/**
 * Compile a header line into one path per column, in column order
 */
export function compileHeaders(headerLine: string): KeyPath[] {
  return splitCsvLine(headerLine).map(normalizeKeyPath);
}

/**
 * Render a path in `/a/b/0` form (used for logs and the status API)
 */
export function formatKeyPath(path: KeyPath): string {
  return path
    .map(segment => '/' + String(segment).replace(/~/g, '~0').replace(/\//g, '~1'))
    .join('');
}
