import { ExtractionResult } from '../types.js';
import { extractLastError } from '../utils/error-extractor.js';
import { log } from '../utils/logger.js';
import { ErrorSink } from './clipboard.js';
import { DashboardState, setStatus } from './dashboard-state.js';
import { MetricsCollector } from './metrics.js';

export const EXTRACT_ERROR_KEY = 'e';

export type ExtractionOutcome = 'copied' | 'saved' | 'save_failed' | 'not_found';

export interface InputDispatcherOptions {
  logPath: string;
  errorDumpPath: string;
  readFull: (filePath: string) => string;
  sink: ErrorSink;
  metrics: MetricsCollector;
  extract?: (fullText: string) => ExtractionResult;
}

/**
 * Maps single key presses to state changes. Every press re-reads the whole log
 * and extracts again; there is no debouncing.
 */
export class InputDispatcher {
  private readonly extract: (fullText: string) => ExtractionResult;

  constructor(private readonly options: InputDispatcherOptions) {
    this.extract = options.extract ?? extractLastError;
  }

  handleKey(key: string, state: DashboardState, now: number): void {
    if (key.toLowerCase() !== EXTRACT_ERROR_KEY) return;

    const { outcome, message } = this.extractAndDeliver();
    setStatus(state, message, now);
    this.options.metrics.incrementCounter('devmon_error_extractions_total', { result: outcome });
    log(`Error extraction: ${outcome}`);
  }

  private extractAndDeliver(): { outcome: ExtractionOutcome; message: string } {
    const { logPath, errorDumpPath, readFull, sink } = this.options;

    const result = this.extract(readFull(logPath));
    if (!result.found) {
      return { outcome: 'not_found', message: 'No error found' };
    }

    const text = result.block.join('\n');
    if (sink.copyToClipboard(text)) {
      return { outcome: 'copied', message: 'Error copied!' };
    }

    if (sink.saveErrorToFile(text, errorDumpPath)) {
      return { outcome: 'saved', message: `Error saved to ${errorDumpPath}` };
    }

    return { outcome: 'save_failed', message: 'Could not copy or save error' };
  }
}
