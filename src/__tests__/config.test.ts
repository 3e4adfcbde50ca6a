import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import os from 'os';
import path from 'path';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should fall back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.logPath).toBe(path.join(os.tmpdir(), 'miau-dev.log'));
    expect(config.errorDumpPath).toBe(path.join(os.tmpdir(), 'miau-last-error.txt'));
    expect(config.dbPath).toBe(path.join(os.homedir(), '.config', 'miau', 'data', 'miau.db'));
    expect(config.primaryPid).toBeUndefined();
    expect(config.dashboard).toEqual({
      refreshIntervalMs: 2000,
      maxLogLines: 18,
      statusTtlMs: 5000,
      appUrl: 'http://localhost:9245',
    });
    expect(config.clipboardCommand).toBe('xclip -selection clipboard');
    expect(config.metrics.enabled).toBe(true);
    expect(config.statusPort).toBeUndefined();
  });

  it('should leave the primary service untracked without a PID', () => {
    const config = loadConfig({});

    expect(config.services).toEqual([
      { name: 'wails3 dev', critical: true },
      { name: 'Go Backend', pattern: 'miau-desktop' },
      { name: 'Vite (Svelte)', pattern: 'vite' },
    ]);
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      MIAU_LOG: '/var/log/dev.log',
      WAILS_PID: ' 4321 ',
      MONITOR_REFRESH_MS: '500',
      MONITOR_STATUS_PORT: '9246',
      METRICS_ENABLED: 'false',
      CLIPBOARD_COMMAND: 'wl-copy',
    });

    expect(config.logPath).toBe('/var/log/dev.log');
    expect(config.primaryPid).toBe(4321);
    expect(config.services[0]).toEqual({ name: 'wails3 dev', pid: 4321, critical: true });
    expect(config.dashboard.refreshIntervalMs).toBe(500);
    expect(config.statusPort).toBe(9246);
    expect(config.metrics.enabled).toBe(false);
    expect(config.clipboardCommand).toBe('wl-copy');
  });

  it.each(['abc', '0', '12 34', '-5'])('should leave the primary service untracked for WAILS_PID %j', (value) => {
    const config = loadConfig({ WAILS_PID: value });

    expect(config.primaryPid).toBeUndefined();
    expect(config.services[0]).toEqual({ name: 'wails3 dev', critical: true });
    expect(console.log).toHaveBeenCalledWith(
      expect.stringContaining(`[WARN] Ignoring WAILS_PID "${value}": not a positive PID, wails3 dev is not tracked`),
    );
  });

  it('should list every invalid value', () => {
    expect(() => loadConfig({ MONITOR_REFRESH_MS: '10', MONITOR_LOG_LINES: '0' })).toThrow(
      'Configuration validation failed: dashboard.refreshIntervalMs: Number must be greater than or equal to 250, dashboard.maxLogLines: Number must be greater than or equal to 1',
    );
  });

  it('should not read the environment when the module is imported', () => {
    const previous = process.env.MONITOR_REFRESH_MS;
    process.env.MONITOR_REFRESH_MS = '10';
    try {
      jest.isolateModules(() => {
        expect(() => require('../config.js')).not.toThrow();
      });
    } finally {
      if (previous === undefined) delete process.env.MONITOR_REFRESH_MS;
      else process.env.MONITOR_REFRESH_MS = previous;
    }
  });
});
