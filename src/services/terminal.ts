const CTRL_C = '\u0003';

const HIDE_CURSOR = '\x1B[?25l';
const SHOW_CURSOR = '\x1B[?25h';
const ENTER_ALT_SCREEN = '\x1B[?1049h';
const LEAVE_ALT_SCREEN = '\x1B[?1049l';

export interface KeyboardStream {
  isTTY?: boolean;
  setRawMode(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  resume(): unknown;
  pause(): unknown;
  on(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  off(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
}

export interface FrameSink {
  write(chunk: string): unknown;
}

/**
 * Any source of single key presses that can be checked without waiting.
 */
export interface KeySource {
  poll(): string | undefined;
}

export class TerminalSetupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TerminalSetupError';
  }
}

/**
 * Owns the terminal while the dashboard runs: raw mode on stdin, cursor hidden,
 * alternate screen. Key presses are buffered as they arrive and handed out one
 * at a time by `poll()`.
 */
export class TerminalSession implements KeySource {
  private readonly pending: string[] = [];
  private rawMode = false;
  private screenTaken = false;
  private listening = false;
  private onInterrupt: () => void = () => {};

  constructor(
    private readonly input: KeyboardStream,
    private readonly output: FrameSink,
  ) {}

  private readonly handleData = (chunk: string | Buffer): void => {
    for (const key of Array.from(chunk.toString())) {
      if (key === CTRL_C) {
        this.onInterrupt();
      } else {
        this.pending.push(key);
      }
    }
  };

  acquire(onInterrupt: () => void): void {
    if (!this.input.isTTY) {
      throw new TerminalSetupError('Dev monitor requires an interactive terminal (TTY)');
    }

    this.onInterrupt = onInterrupt;
    try {
      this.input.setRawMode(true);
      this.rawMode = true;

      this.input.setEncoding('utf-8');
      this.input.on('data', this.handleData);
      this.listening = true;
      this.input.resume();

      this.output.write(ENTER_ALT_SCREEN + HIDE_CURSOR);
      this.screenTaken = true;
    } catch (error) {
      this.release();
      throw new TerminalSetupError(`Failed to set up terminal: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  poll(): string | undefined {
    return this.pending.shift();
  }

  /**
   * Restores whatever `acquire` changed. Safe to call more than once.
   */
  release(): void {
    if (this.listening) {
      this.input.off('data', this.handleData);
      this.input.pause();
      this.listening = false;
    }
    if (this.rawMode) {
      this.input.setRawMode(false);
      this.rawMode = false;
    }
    if (this.screenTaken) {
      this.output.write(SHOW_CURSOR + LEAVE_ALT_SCREEN);
      this.screenTaken = false;
    }
    this.pending.length = 0;
  }
}
