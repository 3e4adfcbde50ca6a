import os from 'os';
import path from 'path';
import { z } from 'zod';
import { log } from './utils/logger.js';

const serviceSchema = z.object({
  name: z.string().min(1),
  pid: z.number().int().positive().optional(),
  pattern: z.string().min(1).optional(),
  critical: z.boolean().optional(),
});

const configSchema = z.object({
  // Monitored files
  logPath: z.string().min(1),
  errorDumpPath: z.string().min(1),
  dbPath: z.string().min(1),

  // Primary service PID; anything but a positive integer leaves it untracked
  primaryPid: z.number().int().positive().optional(),

  dashboard: z.object({
    refreshIntervalMs: z.number().int().min(250).max(60000).default(2000),
    maxLogLines: z.number().int().min(1).max(200).default(18),
    statusTtlMs: z.number().int().min(500).default(5000),
    appUrl: z.string().url().default('http://localhost:9245'),
  }).default({}),

  clipboardCommand: z.string().min(1).default('xclip -selection clipboard'),
  commandTimeoutMs: z.number().int().min(100).default(1500),

  metrics: z.object({
    enabled: z.boolean().default(true),
  }).default({}),

  statusPort: z.number().int().min(1).max(65535).optional(),

  services: z.array(serviceSchema).min(1),
});

export type Config = z.infer<typeof configSchema>;

function optionalInt(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function parsePid(value: string | undefined): number | undefined {
  const raw = (value || '').trim();
  if (!raw) return undefined;

  const pid = /^\d+$/.test(raw) ? parseInt(raw, 10) : 0;
  if (pid <= 0) {
    log(`Ignoring WAILS_PID "${raw}": not a positive PID, wails3 dev is not tracked`, 'warn');
    return undefined;
  }
  return pid;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const primaryPid = parsePid(env.WAILS_PID);

  const rawConfig = {
    logPath: env.MIAU_LOG || path.join(os.tmpdir(), 'miau-dev.log'),
    errorDumpPath: env.MIAU_ERROR_FILE || path.join(os.tmpdir(), 'miau-last-error.txt'),
    dbPath: env.MIAU_DB || path.join(os.homedir(), '.config', 'miau', 'data', 'miau.db'),
    primaryPid,
    dashboard: {
      refreshIntervalMs: parseInt(env.MONITOR_REFRESH_MS || '2000', 10),
      maxLogLines: parseInt(env.MONITOR_LOG_LINES || '18', 10),
      statusTtlMs: parseInt(env.MONITOR_STATUS_TTL_MS || '5000', 10),
      appUrl: env.MIAU_APP_URL || 'http://localhost:9245',
    },
    clipboardCommand: env.CLIPBOARD_COMMAND || 'xclip -selection clipboard',
    commandTimeoutMs: parseInt(env.MONITOR_COMMAND_TIMEOUT_MS || '1500', 10),
    metrics: {
      enabled: env.METRICS_ENABLED !== 'false',
    },
    statusPort: optionalInt(env.MONITOR_STATUS_PORT),
    services: [
      { name: 'wails3 dev', pid: primaryPid, critical: true },
      { name: 'Go Backend', pattern: env.MIAU_BACKEND_PATTERN || 'miau-desktop' },
      { name: 'Vite (Svelte)', pattern: env.MIAU_FRONTEND_PATTERN || 'vite' },
    ],
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new Error(`Configuration validation failed: ${error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')}`);
    }
    throw error;
  }
}
