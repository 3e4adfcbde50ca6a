import fs from 'fs';
import { CommandRunner, parseCommandLine, runCommand } from '../utils/command.js';
import { log } from '../utils/logger.js';

export interface ErrorSink {
  copyToClipboard(text: string): boolean;
  saveErrorToFile(text: string, filePath: string): boolean;
}

/**
 * Pipes text into the configured clipboard program (xclip by default) and
 * falls back to a plain file when asked to.
 */
export class Clipboard implements ErrorSink {
  private readonly command: string;
  private readonly args: string[];

  constructor(
    commandLine: string,
    private readonly timeoutMs: number,
    private readonly run: CommandRunner = runCommand,
  ) {
    const parsed = parseCommandLine(commandLine);
    this.command = parsed.command;
    this.args = parsed.args;
  }

  copyToClipboard(text: string): boolean {
    const result = this.run(this.command, this.args, { input: text, timeoutMs: this.timeoutMs, stdout: 'ignore' });
    if (!result) {
      log(`Clipboard command ${this.command} could not be run`, 'warn');
      return false;
    }
    return result.status === 0;
  }

  saveErrorToFile(text: string, filePath: string): boolean {
    try {
      fs.writeFileSync(filePath, text);
      return true;
    } catch (err) {
      log(`Failed to save error to ${filePath}: ${err instanceof Error ? err.message : String(err)}`, 'warn');
      return false;
    }
  }
}
