export interface ProcessSample {
  cpuPercent: number;
  memPercent: number;
  residentMB: number;
}

/**
 * System-wide sample. All zeros means the query failed ("unknown"), not idle.
 */
export interface SystemSample {
  cpuTotalPercent: number;
  memUsedMB: number;
  memTotalMB: number;
}

export interface StorageSample {
  sizeMB: number;
}

export type LogLine = string;

export type ErrorBlock = [LogLine, ...LogLine[]];

export type ExtractionResult =
  | { found: true; block: ErrorBlock }
  | { found: false };

export interface StatusMessage {
  text: string;
  createdAt: number;
}

export interface ServiceDefinition {
  name: string;
  pid?: number;
  pattern?: string;
  // Critical services are shown in red instead of dimmed while down
  critical?: boolean;
}
