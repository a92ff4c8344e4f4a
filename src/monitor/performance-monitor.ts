/**
 * Performance Monitor
 *
 * Measures wall-clock duration and samples resource usage around an opaque call.
 * Sampling runs on an unref'd interval so it never keeps the process alive.
 */

import { performance } from 'node:perf_hooks';
import type { ResourceUsage } from '../types/index.js';
import { MonitorStateError } from '../errors/index.js';
import { createLogger } from '../utils/logger.js';
import { ProcessResourceProbe, type ResourceProbe, type ResourceSample } from './resource-probe.js';

const logger = createLogger('PerformanceMonitor');

const DEFAULT_SAMPLE_INTERVAL_MS = 100;

export interface PerformanceMonitorOptions {
  sampleIntervalMs?: number;
  probe?: ResourceProbe;
  /** Monotonic clock in milliseconds */
  clock?: () => number;
}

export interface Measurement {
  durationMs: number;
  /** Absent when sampling degraded */
  resourceUsage?: ResourceUsage;
  degraded: boolean;
  degradedReason?: string;
}

export interface MeasuredResult<T> {
  result: PromiseSettledResult<T>;
  measurement: Measurement;
}

/**
 * PerformanceMonitor
 *
 * One instance measures one call at a time: start() / stop(), or measure(fn).
 */
export class PerformanceMonitor {
  private readonly sampleIntervalMs: number;
  private readonly probe: ResourceProbe;
  private readonly clock: () => number;

  private startTime: number | null = null;
  private timer: NodeJS.Timeout | null = null;
  private samples: ResourceSample[] = [];
  private degradedReason: string | null = null;

  constructor(options: PerformanceMonitorOptions = {}) {
    this.sampleIntervalMs = options.sampleIntervalMs ?? DEFAULT_SAMPLE_INTERVAL_MS;
    this.probe = options.probe ?? new ProcessResourceProbe();
    this.clock = options.clock ?? (() => performance.now());
  }

  get isRunning(): boolean {
    return this.startTime !== null;
  }

  /**
   * Begin timing and background sampling
   *
   * @throws MonitorStateError if already started
   */
  start(): void {
    if (this.startTime !== null) {
      throw new MonitorStateError('Monitor already started', { code: 'MONITOR_ALREADY_STARTED' });
    }

    this.samples = [];
    this.degradedReason = null;
    this.startTime = this.clock();
    this.takeSample();

    if (this.degradedReason === null) {
      this.timer = setInterval(() => this.takeSample(), this.sampleIntervalMs);
      this.timer.unref();
    }
  }

  /**
   * Stop sampling and return the measurement
   *
   * @throws MonitorStateError if start() was not called
   */
  stop(): Measurement {
    if (this.startTime === null) {
      throw new MonitorStateError('Monitor stopped before it was started', {
        code: 'MONITOR_NOT_STARTED',
      });
    }

    this.clearTimer();
    this.takeSample();

    const durationMs = Math.max(0, this.clock() - this.startTime);
    this.startTime = null;

    if (this.degradedReason !== null) {
      return { durationMs, degraded: true, degradedReason: this.degradedReason };
    }

    return { durationMs, resourceUsage: summarizeSamples(this.samples), degraded: false };
  }

  /**
   * Measure a call; the monitor is stopped whether the call resolves or rejects
   */
  async measure<T>(fn: () => Promise<T>): Promise<MeasuredResult<T>> {
    this.start();
    let result: PromiseSettledResult<T>;
    try {
      result = { status: 'fulfilled', value: await fn() };
    } catch (reason) {
      result = { status: 'rejected', reason };
    }
    return { result, measurement: this.stop() };
  }

  private takeSample(): void {
    if (this.degradedReason !== null) {
      return;
    }
    try {
      this.samples.push(this.probe.sample());
    } catch (error) {
      this.degradedReason = error instanceof Error ? error.message : String(error);
      this.clearTimer();
      logger.warn(
        { reason: this.degradedReason },
        'Resource sampling unavailable, monitoring degraded'
      );
    }
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}

/**
 * Peak memory and average CPU across consecutive sample pairs
 *
 * CPU percent of one interval = CPU time delta / wall time delta x 100.
 */
export function summarizeSamples(samples: ResourceSample[]): ResourceUsage {
  let peakMemoryBytes = 0;
  const cpuPercents: number[] = [];

  samples.forEach((sample, index) => {
    peakMemoryBytes = Math.max(peakMemoryBytes, sample.memoryBytes);
    const previous = index > 0 ? samples[index - 1] : undefined;
    if (previous) {
      const wallDeltaMs = sample.wallTimeMs - previous.wallTimeMs;
      if (wallDeltaMs > 0) {
        const cpuDeltaMs = (sample.cpuTimeMicros - previous.cpuTimeMicros) / 1000;
        cpuPercents.push(Math.max(0, (cpuDeltaMs / wallDeltaMs) * 100));
      }
    }
  });

  const averageCpuPercent =
    cpuPercents.length > 0 ? cpuPercents.reduce((sum, v) => sum + v, 0) / cpuPercents.length : 0;

  return { peakMemoryBytes, averageCpuPercent, sampleCount: samples.length };
}
