import fs from 'fs';
import { ProcessSample, ServiceDefinition, StorageSample, SystemSample } from '../types.js';
import { SampleProvider } from './process-stats.js';

export type ServiceSamples = Map<string, ProcessSample | null>;

/**
 * Resolves the fixed service list into samples once per tick. A service that is
 * not running is `null` (absent), never a zero-valued sample.
 */
export class StatsAggregator {
  constructor(
    private readonly provider: SampleProvider,
    private readonly services: readonly ServiceDefinition[],
    private readonly dbPath: string,
  ) {}

  getServices(): readonly ServiceDefinition[] {
    return this.services;
  }

  collectServices(): ServiceSamples {
    const samples: ServiceSamples = new Map();
    for (const service of this.services) {
      samples.set(service.name, this.sampleService(service));
    }
    return samples;
  }

  collectSystem(): SystemSample {
    return this.provider.systemSample();
  }

  /**
   * Size of the database file; only stat'ed, never opened.
   */
  collectStorage(): StorageSample | null {
    try {
      const stats = fs.statSync(this.dbPath, { throwIfNoEntry: false });
      if (!stats || !stats.isFile()) return null;
      return { sizeMB: stats.size / (1024 * 1024) };
    } catch {
      // Unreadable parent directory and the like: shown as missing
      return null;
    }
  }

  private sampleService(service: ServiceDefinition): ProcessSample | null {
    const pid = service.pid ?? (service.pattern ? this.provider.findPidByPattern(service.pattern) : null);
    if (pid === null || pid === undefined) return null;
    return this.provider.sampleByPid(pid);
  }
}
