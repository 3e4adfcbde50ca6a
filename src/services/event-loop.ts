import { log } from '../utils/logger.js';
import { DashboardState, DashboardView, RefreshSources, createDashboardState, refreshDashboard } from './dashboard-state.js';
import { InputDispatcher } from './input-dispatcher.js';
import { MetricsCollector } from './metrics.js';
import { KeySource } from './terminal.js';

export interface RenderingSurface {
  render(view: DashboardView, now: number): void;
}

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type LoopExit = 'interrupted';

export interface EventLoopOptions {
  keys: KeySource;
  dispatcher: InputDispatcher;
  sources: RefreshSources;
  surface: RenderingSurface;
  metrics: MetricsCollector;
  intervalMs: number;
  now?: () => number;
  sleep?: Sleep;
}

/**
 * Resolves after `ms`, or as soon as the signal aborts.
 */
export const interruptibleSleep: Sleep = (ms, signal) => new Promise(resolve => {
  if (signal.aborted) {
    resolve();
    return;
  }

  const onAbort = () => {
    clearTimeout(timer);
    resolve();
  };
  const timer = setTimeout(() => {
    signal.removeEventListener('abort', onAbort);
    resolve();
  }, ms);
  signal.addEventListener('abort', onAbort, { once: true });
});

/**
 * Single-threaded dashboard scheduler. Each tick takes at most one pending key
 * and dispatches it, then refreshes the state from the providers and renders
 * it, then sleeps for the fixed interval. The state is only written here, so
 * nothing needs locking.
 */
export class EventLoop {
  private readonly state: DashboardState = createDashboardState();
  private readonly controller = new AbortController();
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private isRunning = false;

  constructor(private readonly options: EventLoopOptions) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? interruptibleSleep;
  }

  getState(): DashboardView {
    return this.state;
  }

  tick(): void {
    const { keys, dispatcher, sources, surface, metrics } = this.options;
    const started = process.hrtime.bigint();
    const now = this.now();

    // Input first, so a status set by this key shows up in this tick's frame
    const key = keys.poll();
    if (key !== undefined) {
      dispatcher.handleKey(key, this.state, now);
    }

    refreshDashboard(this.state, sources, now);
    surface.render(this.state, now);

    const servicesUp = [...this.state.services.values()].filter(sample => sample !== null).length;
    metrics.incrementCounter('devmon_ticks_total');
    metrics.setGauge('devmon_services_up', servicesUp);
    metrics.setGauge('devmon_system_cpu_percent', this.state.system.cpuTotalPercent);
    metrics.observeHistogram('devmon_tick_duration_seconds', Number(process.hrtime.bigint() - started) / 1e9);
  }

  async run(): Promise<LoopExit> {
    if (this.isRunning) {
      throw new Error('Event loop is already running');
    }

    this.isRunning = true;
    log(`Dashboard loop started (tick every ${this.options.intervalMs}ms)`);
    try {
      while (!this.controller.signal.aborted) {
        this.tick();
        await this.sleep(this.options.intervalMs, this.controller.signal);
      }
    } finally {
      this.isRunning = false;
    }

    log('Dashboard loop interrupted');
    return 'interrupted';
  }

  /**
   * The loop's only cancellation path: ends the current sleep and the loop.
   */
  stop(): void {
    this.controller.abort();
  }
}
