import fs from 'fs/promises';
import path from 'path';

const LOG_FILE = path.join(process.cwd(), 'devmonitor.log');

export type LogLevel = 'info' | 'error' | 'warn';

// Queue for file writes to avoid blocking the render loop
const logQueue: string[] = [];
let isWriting = false;

// The dashboard owns stdout while it runs; log lines then go to the file only
let consoleEcho = true;

export function setConsoleEcho(enabled: boolean): void {
  consoleEcho = enabled;
}

async function writeLogQueue(): Promise<void> {
  if (isWriting || logQueue.length === 0) return;

  isWriting = true;
  const messages = logQueue.splice(0); // Drain queue

  try {
    await fs.appendFile(LOG_FILE, messages.join(''));
  } catch (err) {
    if (consoleEcho) {
      console.error('Failed to write to log file:', err);
    }
  } finally {
    isWriting = false;

    // If more logs arrived while writing, write them now
    if (logQueue.length > 0) {
      setTimeout(() => void writeLogQueue(), 0);
    }
  }
}

export function log(message: string, level: LogLevel = 'info'): void {
  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}\n`;

  if (consoleEcho) {
    console.log(logMessage.trim());
  }

  logQueue.push(logMessage);
  if (!isWriting) {
    setTimeout(() => void writeLogQueue(), 0);
  }
}

/**
 * Resolves once every queued line has been appended to the log file.
 */
export async function flushLogs(): Promise<void> {
  while (logQueue.length > 0 || isWriting) {
    if (isWriting) {
      await new Promise(resolve => setTimeout(resolve, 5));
    } else {
      await writeLogQueue();
    }
  }
}

export function logError(error: Error | unknown, context?: string): void {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  log(`${context ? `[${context}] ` : ''}${message}`, 'error');
  if (stack) {
    log(stack, 'error');
  }
}
