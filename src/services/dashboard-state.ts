import { LogLine, ProcessSample, StatusMessage, StorageSample, SystemSample } from '../types.js';
import { hasErrorLine } from '../utils/error-extractor.js';
import { ServiceSamples, StatsAggregator } from './aggregator.js';
import { UNKNOWN_SYSTEM_SAMPLE } from './process-stats.js';

export const STATUS_TTL_MS = 5000;

/**
 * Everything the dashboard shows. Owned and written by the event loop only.
 */
export interface DashboardState {
  services: ServiceSamples;
  system: SystemSample;
  storage: StorageSample | null;
  logTail: LogLine[];
  hasError: boolean;
  status?: StatusMessage;
  // 0 until the first refresh
  refreshedAt: number;
}

export interface DashboardView {
  readonly services: ReadonlyMap<string, ProcessSample | null>;
  readonly system: Readonly<SystemSample>;
  readonly storage: Readonly<StorageSample> | null;
  readonly logTail: readonly LogLine[];
  readonly hasError: boolean;
  readonly status?: Readonly<StatusMessage>;
  readonly refreshedAt: number;
}

export interface RefreshSources {
  aggregator: StatsAggregator;
  readTail: () => LogLine[];
}

export function createDashboardState(): DashboardState {
  return {
    services: new Map(),
    system: UNKNOWN_SYSTEM_SAMPLE,
    storage: null,
    logTail: [],
    hasError: false,
    refreshedAt: 0,
  };
}

/**
 * Replaces the current status message. Old messages are not stacked.
 */
export function setStatus(state: DashboardState, text: string, now: number): void {
  state.status = { text, createdAt: now };
}

/**
 * The status text while it is still fresh. Expired messages stay in the state
 * and are simply not shown.
 */
export function visibleStatus(view: DashboardView, now: number, ttlMs: number = STATUS_TTL_MS): string | undefined {
  if (!view.status) return undefined;
  return now - view.status.createdAt < ttlMs ? view.status.text : undefined;
}

export function refreshDashboard(state: DashboardState, sources: RefreshSources, now: number): void {
  state.services = sources.aggregator.collectServices();
  state.system = sources.aggregator.collectSystem();
  state.storage = sources.aggregator.collectStorage();
  state.logTail = sources.readTail();
  state.hasError = hasErrorLine(state.logTail);
  state.refreshedAt = now;
}
