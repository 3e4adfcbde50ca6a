import { ErrorBlock, ExtractionResult, LogLine } from '../types.js';
import { splitLines } from './lines.js';

const TRIGGER_WORDS = ['error', 'panic', 'fail'];

// Stack frame prefixes, checked against the trimmed line
const FRAME_PREFIXES = ['/', 'main.', 'runtime.', 'goroutine '];

export type LineKind = 'error' | 'warn' | 'info' | 'build' | 'ready' | 'hmr' | 'plain';

const LINE_KINDS: Array<[Exclude<LineKind, 'plain'>, string[]]> = [
  ['error', TRIGGER_WORDS],
  ['warn', ['warn']],
  ['info', ['info']],
  ['build', ['building', 'compiled']],
  ['ready', ['watching', 'ready']],
  ['hmr', ['hmr', 'hot']],
];

export function isTriggerLine(line: LogLine): boolean {
  const lower = line.toLowerCase();
  return TRIGGER_WORDS.some(word => lower.includes(word));
}

export function isContinuationLine(line: LogLine): boolean {
  const trimmed = line.trim();
  return trimmed === ''
    || line.includes('\t')
    || FRAME_PREFIXES.some(prefix => trimmed.startsWith(prefix));
}

/**
 * Finds the most recent error block (trigger line plus the stack-trace-shaped
 * lines right after it).
 *
 * The trigger check runs before the continuation check on every line, so a
 * frame such as `/app/error_handler.go` starts a new block instead of
 * extending the current one.
 */
export function extractLastError(fullText: string): ExtractionResult {
  let block: ErrorBlock | undefined;
  let inError = false;

  for (const line of splitLines(fullText)) {
    if (isTriggerLine(line)) {
      block = [line];
      inError = true;
    } else if (inError && block) {
      if (isContinuationLine(line)) {
        block.push(line);
      } else {
        // Keep the block as the best candidate until a later trigger replaces it
        inError = false;
      }
    }
  }

  return block ? { found: true, block } : { found: false };
}

export function hasErrorLine(lines: readonly LogLine[]): boolean {
  return lines.some(isTriggerLine);
}

export function classifyLine(line: LogLine): LineKind {
  const lower = line.toLowerCase();
  for (const [kind, words] of LINE_KINDS) {
    if (words.some(word => lower.includes(word))) {
      return kind;
    }
  }
  return 'plain';
}
