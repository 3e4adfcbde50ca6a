#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config.js';
import { StatsAggregator } from './services/aggregator.js';
import { Clipboard } from './services/clipboard.js';
import { EventLoop } from './services/event-loop.js';
import { InputDispatcher } from './services/input-dispatcher.js';
import { MetricsCollector } from './services/metrics.js';
import { PsSampleProvider } from './services/process-stats.js';
import { TerminalRenderer } from './services/renderer.js';
import { StatusServer } from './services/server.js';
import { TerminalSession } from './services/terminal.js';
import { readFull, tail } from './utils/log-tail.js';
import { flushLogs, log, logError, setConsoleEcho } from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const metrics = new MetricsCollector(config.metrics.enabled);

  const aggregator = new StatsAggregator(
    new PsSampleProvider(config.commandTimeoutMs),
    config.services,
    config.dbPath,
  );

  const dispatcher = new InputDispatcher({
    logPath: config.logPath,
    errorDumpPath: config.errorDumpPath,
    readFull,
    sink: new Clipboard(config.clipboardCommand, config.commandTimeoutMs),
    metrics,
  });

  const session = new TerminalSession(process.stdin, process.stdout);

  const loop = new EventLoop({
    keys: session,
    dispatcher,
    sources: {
      aggregator,
      readTail: () => tail(config.logPath, config.dashboard.maxLogLines),
    },
    surface: new TerminalRenderer(process.stdout, {
      appUrl: config.dashboard.appUrl,
      refreshIntervalMs: config.dashboard.refreshIntervalMs,
      statusTtlMs: config.dashboard.statusTtlMs,
      services: aggregator.getServices(),
    }),
    metrics,
    intervalMs: config.dashboard.refreshIntervalMs,
  });

  const statusServer = config.statusPort !== undefined
    ? new StatusServer(loop, metrics, config.statusPort, config.dashboard.statusTtlMs)
    : undefined;

  // With stdin in raw mode Ctrl+C arrives as a key; signals still come from kill
  process.on('SIGINT', () => loop.stop());
  process.on('SIGTERM', () => loop.stop());

  log(`Dev monitor starting (log: ${config.logPath})`);
  session.acquire(() => loop.stop());
  setConsoleEcho(false);
  statusServer?.start();

  try {
    await loop.run();
  } finally {
    session.release();
    setConsoleEcho(true);
    await statusServer?.stop();
  }

  log('Dev monitor stopped');
}

main()
  .then(() => flushLogs())
  .then(() => process.exit(0))
  .catch(async (error) => {
    setConsoleEcho(true);
    logError(error, 'Dev monitor failed');
    await flushLogs();
    process.exit(1);
  });
