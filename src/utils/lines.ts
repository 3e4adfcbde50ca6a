import { LogLine } from '../types.js';

/**
 * Splits text into lines on `\n` or `\r\n`. A trailing terminator does not
 * produce an extra empty line; an empty string has no lines at all.
 */
export function splitLines(text: string): LogLine[] {
  if (text === '') return [];

  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
