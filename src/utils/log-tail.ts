import fs from 'fs';
import { LogLine } from '../types.js';
import { splitLines } from './lines.js';
import { log } from './logger.js';

const CHUNK_SIZE = 64 * 1024;
const NEWLINE = 0x0a;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function reportReadFailure(filePath: string, err: unknown): void {
  // A missing log just means the dev server has not written anything yet
  if (isMissingFile(err)) return;
  log(`Could not read log file ${filePath}: ${err instanceof Error ? err.message : String(err)}`, 'warn');
}

/**
 * Returns the last `maxLines` lines of the file, oldest first.
 *
 * Reads backwards from the current end of file, one chunk at a time, until more
 * than `maxLines` line breaks are buffered, so the first (possibly partial)
 * line in the buffer is never part of the result. No offset is kept between
 * calls. Any I/O failure yields an empty list.
 */
export function tail(filePath: string, maxLines: number): LogLine[] {
  if (maxLines <= 0) return [];

  let fd: number | undefined;
  try {
    fd = fs.openSync(filePath, 'r');
    const { size } = fs.fstatSync(fd);

    const chunks: Buffer[] = [];
    let position = size;
    let newlines = 0;

    while (position > 0 && newlines <= maxLines) {
      const length = Math.min(CHUNK_SIZE, position);
      position -= length;

      const chunk = Buffer.alloc(length);
      const bytesRead = fs.readSync(fd, chunk, 0, length, position);
      const data = chunk.subarray(0, bytesRead);
      chunks.unshift(data);

      for (const byte of data) {
        if (byte === NEWLINE) newlines++;
      }
    }

    return splitLines(Buffer.concat(chunks).toString('utf-8')).slice(-maxLines);
  } catch (err) {
    reportReadFailure(filePath, err);
    return [];
  } finally {
    if (fd !== undefined) {
      fs.closeSync(fd);
    }
  }
}

/**
 * Whole file as text, or '' when it cannot be read.
 */
export function readFull(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    reportReadFailure(filePath, err);
    return '';
  }
}
