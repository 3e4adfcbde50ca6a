import { ProcessSample, SystemSample } from '../types.js';
import { CommandRunner, runCommand } from '../utils/command.js';

export interface SampleProvider {
  sampleByPid(pid: number): ProcessSample | null;
  findPidByPattern(pattern: string): number | null;
  systemSample(): SystemSample;
}

export const UNKNOWN_SYSTEM_SAMPLE: SystemSample = Object.freeze({
  cpuTotalPercent: 0,
  memUsedMB: 0,
  memTotalMB: 0,
});

/**
 * Parses `ps -o %cpu,%mem,rss --no-headers` output for one process.
 */
export function parsePsSample(stdout: string): ProcessSample | null {
  const parts = stdout.trim().split(/\s+/);
  if (parts.length < 3) return null;

  const cpuPercent = parseFloat(parts[0]);
  const memPercent = parseFloat(parts[1]);
  const rssKb = parseInt(parts[2], 10);
  if ([cpuPercent, memPercent, rssKb].some(Number.isNaN)) return null;

  return { cpuPercent, memPercent, residentMB: rssKb / 1024 };
}

/**
 * First PID printed by `pgrep`.
 */
export function parsePgrep(stdout: string): number | null {
  const first = stdout.trim().split('\n')[0]?.trim();
  if (!first || !/^\d+$/.test(first)) return null;
  return parseInt(first, 10);
}

export function parseCpuTotal(stdout: string): number | null {
  let total = 0;
  for (const value of stdout.split(/\s+/)) {
    if (!value) continue;
    const cpu = parseFloat(value);
    if (Number.isNaN(cpu)) return null;
    total += cpu;
  }
  return total;
}

/**
 * Reads the `Mem:` row of `free -m` (total, then used).
 */
export function parseFreeMemory(stdout: string): { usedMB: number; totalMB: number } | null {
  const row = stdout.split('\n').find(line => line.startsWith('Mem:'));
  if (!row) return null;

  const parts = row.trim().split(/\s+/);
  const totalMB = parseInt(parts[1], 10);
  const usedMB = parseInt(parts[2], 10);
  if (Number.isNaN(totalMB) || Number.isNaN(usedMB) || totalMB <= 0) return null;

  return { usedMB, totalMB };
}

/**
 * Memory usage in percent, or null while the sample is unknown.
 */
export function memoryPercent(sample: SystemSample): number | null {
  if (sample.memTotalMB <= 0) return null;
  return (sample.memUsedMB / sample.memTotalMB) * 100;
}

/**
 * Samples processes through `ps`, `pgrep` and `free`. Never throws: a command
 * that cannot run or exits non-zero yields an absent or unknown sample.
 */
export class PsSampleProvider implements SampleProvider {
  constructor(
    private readonly timeoutMs: number,
    private readonly run: CommandRunner = runCommand,
  ) {}

  sampleByPid(pid: number): ProcessSample | null {
    const result = this.exec('ps', ['-p', String(pid), '-o', '%cpu,%mem,rss', '--no-headers']);
    return result === null ? null : parsePsSample(result);
  }

  findPidByPattern(pattern: string): number | null {
    const result = this.exec('pgrep', ['-f', pattern]);
    return result === null ? null : parsePgrep(result);
  }

  systemSample(): SystemSample {
    const cpuOutput = this.exec('ps', ['-eo', '%cpu', '--no-headers']);
    const memOutput = this.exec('free', ['-m']);
    if (cpuOutput === null || memOutput === null) return UNKNOWN_SYSTEM_SAMPLE;

    const cpuTotalPercent = parseCpuTotal(cpuOutput);
    const memory = parseFreeMemory(memOutput);
    if (cpuTotalPercent === null || memory === null) return UNKNOWN_SYSTEM_SAMPLE;

    return { cpuTotalPercent, memUsedMB: memory.usedMB, memTotalMB: memory.totalMB };
  }

  private exec(command: string, args: string[]): string | null {
    const result = this.run(command, args, { timeoutMs: this.timeoutMs });
    if (!result || result.status !== 0) return null;
    return result.stdout;
  }
}
