import chalk from 'chalk';
import { ProcessSample, ServiceDefinition } from '../types.js';
import { LineKind, classifyLine } from '../utils/error-extractor.js';
import { DashboardView, visibleStatus } from './dashboard-state.js';
import { RenderingSurface } from './event-loop.js';
import { memoryPercent } from './process-stats.js';
import { FrameSink } from './terminal.js';

export type Painter = InstanceType<typeof chalk.Instance>;

export interface FrameOptions {
  appUrl: string;
  refreshIntervalMs: number;
  statusTtlMs: number;
  services: readonly ServiceDefinition[];
  columns: number;
  now: number;
  paint?: Painter;
}

const CLEAR_SCREEN = '\x1B[H\x1B[2J';
const SEPARATOR = '  │  ';
const ANSI_PATTERN = /\x1B\[[0-9;?]*[ -/]*[@-~]/g;

const NAME_WIDTH = 18;
const COLUMN_WIDTH = 9;

const LINE_STYLES: Record<LineKind, (paint: Painter, text: string) => string> = {
  error: (paint, text) => paint.bold.red(text),
  warn: (paint, text) => paint.yellow(text),
  info: (paint, text) => paint.dim(text),
  build: (paint, text) => paint.green(text),
  ready: (paint, text) => paint.cyan(text),
  hmr: (paint, text) => paint.magenta(text),
  plain: (_paint, text) => text,
};

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

// East Asian wide/fullwidth blocks and the emoji planes
const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x115f],
  [0x2e80, 0x303e],
  [0x3041, 0x33ff],
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0xa000, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe30, 0xfe4f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x1f300, 0x1f64f],
  [0x1f680, 0x1f6ff],
  [0x1f900, 0x1f9ff],
  [0x20000, 0x3fffd],
];

function charWidth(char: string): number {
  const code = char.codePointAt(0) ?? 0;
  if (code === 0x200d || (code >= 0x0300 && code <= 0x036f) || (code >= 0xfe00 && code <= 0xfe0f)) {
    return 0;
  }
  return WIDE_RANGES.some(([start, end]) => code >= start && code <= end) ? 2 : 1;
}

export function displayWidth(text: string): number {
  let width = 0;
  for (const char of text) {
    width += charWidth(char);
  }
  return width;
}

function fit(text: string, columns: number): string {
  if (displayWidth(text) <= columns) return text;

  let kept = '';
  let width = 0;
  for (const char of text) {
    const next = charWidth(char);
    if (width + next > columns - 1) break;
    kept += char;
    width += next;
  }
  return kept + '…';
}

function row(name: string, cpu: string, mem: string, ram: string, status: string): string {
  return ` ${name.padEnd(NAME_WIDTH)}${cpu.padStart(COLUMN_WIDTH)}${mem.padStart(COLUMN_WIDTH)}${ram.padStart(COLUMN_WIDTH + 1)}   ${status}`;
}

function serviceRow(paint: Painter, service: ServiceDefinition, sample: ProcessSample | null | undefined): string {
  if (!sample) {
    const name = service.critical ? paint.red(service.name.padEnd(NAME_WIDTH)) : paint.dim(service.name.padEnd(NAME_WIDTH));
    const dot = service.critical ? paint.red('○') : paint.dim('○');
    return row(name, '-', '-', '-', dot);
  }

  return row(
    paint.green(service.name.padEnd(NAME_WIDTH)),
    `${sample.cpuPercent.toFixed(1)}%`,
    `${sample.memPercent.toFixed(1)}%`,
    `${sample.residentMB.toFixed(0)}MB`,
    paint.green('●'),
  );
}

/**
 * Builds one full dashboard frame as text.
 */
export function renderFrame(view: DashboardView, options: FrameOptions): string {
  const paint: Painter = options.paint ?? chalk;
  const lines: string[] = [];

  lines.push(
    ' ' + paint.bold.cyan('miau ') + paint.bold.green('DEV MONITOR')
    + paint.dim(SEPARATOR) + paint.bold.green.underline(options.appUrl)
    + paint.dim(SEPARATOR) + paint.yellow('Ctrl+C to stop'),
  );
  lines.push('');

  // Services
  lines.push(paint.bold(' Services'));
  lines.push(paint.bold.cyan(row('Service', 'CPU%', 'MEM%', 'RAM', 'Status')));
  for (const service of options.services) {
    lines.push(serviceRow(paint, service, view.services.get(service.name)));
  }
  if (view.storage) {
    lines.push(row(paint.magenta('SQLite DB'.padEnd(NAME_WIDTH)), '-', '-', `${view.storage.sizeMB.toFixed(1)}MB`, paint.green('●')));
  } else {
    lines.push(row(paint.dim('SQLite DB'.padEnd(NAME_WIDTH)), '-', '-', '-', paint.dim('○')));
  }
  lines.push('');

  // Logs
  const title = view.hasError
    ? paint.bold(' Logs') + ' ' + paint.red('[E] copy error')
    : paint.bold(' Logs');
  lines.push(title);
  if (view.logTail.length === 0) {
    lines.push(paint.dim(' Waiting for logs...'));
  } else {
    for (const line of view.logTail) {
      const text = fit(stripAnsi(line).trimEnd(), options.columns - 1);
      lines.push(' ' + LINE_STYLES[classifyLine(line)](paint, text));
    }
  }
  lines.push('');

  // Footer
  const footer: string[] = [];
  const status = visibleStatus(view, options.now, options.statusTtlMs);
  if (status) {
    footer.push(paint.bold.green(status));
  }
  const memPct = memoryPercent(view.system);
  if (memPct === null) {
    footer.push(paint.dim('CPU -'), paint.dim('RAM -'));
  } else {
    footer.push(
      paint.cyan(`CPU ${view.system.cpuTotalPercent.toFixed(1)}%`),
      paint.cyan(`RAM ${view.system.memUsedMB}MB / ${view.system.memTotalMB}MB (${memPct.toFixed(1)}%)`),
    );
  }
  footer.push(paint.dim(`Refresh: ${options.refreshIntervalMs / 1000}s`));
  lines.push(' ' + footer.join(paint.dim(SEPARATOR)));

  return lines.join('\n');
}

/**
 * Draws each frame over the previous one on the terminal.
 */
export class TerminalRenderer implements RenderingSurface {
  constructor(
    private readonly output: FrameSink & { columns?: number },
    private readonly options: Omit<FrameOptions, 'now' | 'columns'>,
  ) {}

  render(view: DashboardView, now: number): void {
    const frame = renderFrame(view, { ...this.options, now, columns: this.output.columns ?? 80 });
    this.output.write(CLEAR_SCREEN + frame + '\n');
  }
}
