/**
 * Resource probes read the host's memory and CPU counters
 */

import { performance } from 'node:perf_hooks';

export interface ResourceSample {
  /** Resident set size */
  memoryBytes: number;
  /** Cumulative user + system CPU time */
  cpuTimeMicros: number;
  /** Monotonic timestamp of the reading */
  wallTimeMs: number;
}

/**
 * Source of resource readings. May throw when the host does not expose a counter.
 */
export interface ResourceProbe {
  sample(): ResourceSample;
}

/**
 * Reads the current process' counters
 *
 * Units run in-process or as children of this process, so this is an upper
 * bound on the cost attributable to the measured call.
 */
export class ProcessResourceProbe implements ResourceProbe {
  sample(): ResourceSample {
    const cpu = process.cpuUsage();
    return {
      memoryBytes: process.memoryUsage().rss,
      cpuTimeMicros: cpu.user + cpu.system,
      wallTimeMs: performance.now(),
    };
  }
}
