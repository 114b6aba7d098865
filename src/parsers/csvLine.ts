/**
 * Line level helpers: classify raw lines and split them into fields.
 *
 * The dialect is deliberately small: commas separate fields, a double quote
 * toggles a quoted region and is dropped, and there is no escape sequence.
 */

const BLANK_LINE = /^[ \t\r\n]*$/;

/**
 * A comment line has '#' as its first non-space character
 */
export function isCommentLine(line: string): boolean {
  let i = 0;
  while (i < line.length && line[i] === ' ') {
    i++;
  }
  return i < line.length && line[i] === '#';
}

export function isBlankLine(line: string): boolean {
  return BLANK_LINE.test(line);
}

/**
 * Header and data lines are everything that is neither comment nor blank
 */
export function isDataLine(line: string): boolean {
  return !isCommentLine(line) && !isBlankLine(line);
}

/**
 * Split one line into raw field strings.
 * Always returns at least one field; an unterminated quote runs to end of line.
 */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === ',' && !inQuotes) {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  // Trailing field after the last comma
  fields.push(current);

  return fields;
}
