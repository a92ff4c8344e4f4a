import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PerformanceMonitor, summarizeSamples } from '../../../src/monitor/index.js';
import type { ResourceProbe, ResourceSample } from '../../../src/monitor/index.js';
import { MonitorStateError } from '../../../src/errors/index.js';

/**
 * Probe returning scripted readings, repeating the last one
 */
function scriptedProbe(readings: ResourceSample[]): ResourceProbe & { calls: number } {
  return {
    calls: 0,
    sample() {
      const reading = readings[Math.min(this.calls, readings.length - 1)];
      this.calls++;
      if (!reading) {
        throw new Error('no readings');
      }
      return reading;
    },
  };
}

describe('PerformanceMonitor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('state checks', () => {
    it('should throw when stopped before start', () => {
      const monitor = new PerformanceMonitor();

      expect(() => monitor.stop()).toThrow(MonitorStateError);
      expect(() => monitor.stop()).toThrow('Monitor stopped before it was started');
    });

    it('should throw when started twice', () => {
      const monitor = new PerformanceMonitor();
      monitor.start();

      expect(() => monitor.start()).toThrow(MonitorStateError);
      monitor.stop();
    });

    it('should be reusable after stop', () => {
      const monitor = new PerformanceMonitor();
      monitor.start();
      monitor.stop();

      expect(() => monitor.start()).not.toThrow();
      expect(monitor.isRunning).toBe(true);
      monitor.stop();
      expect(monitor.isRunning).toBe(false);
    });
  });

  describe('duration', () => {
    it('should report zero for a zero-duration call', () => {
      const monitor = new PerformanceMonitor({ clock: () => 42 });
      monitor.start();

      expect(monitor.stop().durationMs).toBe(0);
    });

    it('should never report a negative duration', () => {
      const times = [100, 90];
      const monitor = new PerformanceMonitor({ clock: () => times.shift() ?? 90 });
      monitor.start();

      expect(monitor.stop().durationMs).toBe(0);
    });

    it('should measure elapsed clock time', () => {
      let now = 1000;
      const monitor = new PerformanceMonitor({ clock: () => now });
      monitor.start();
      now = 1250;

      expect(monitor.stop().durationMs).toBe(250);
    });
  });

  describe('sampling', () => {
    it('should sample at the configured interval', async () => {
      const probe = scriptedProbe([{ memoryBytes: 100, cpuTimeMicros: 0, wallTimeMs: 0 }]);
      const monitor = new PerformanceMonitor({ probe, sampleIntervalMs: 50 });

      monitor.start();
      await vi.advanceTimersByTimeAsync(200);
      const measurement = monitor.stop();

      // 1 at start, 4 ticks, 1 at stop
      expect(probe.calls).toBe(6);
      expect(measurement.resourceUsage?.sampleCount).toBe(6);
      expect(measurement.degraded).toBe(false);
    });

    it('should stop sampling after stop', async () => {
      const probe = scriptedProbe([{ memoryBytes: 100, cpuTimeMicros: 0, wallTimeMs: 0 }]);
      const monitor = new PerformanceMonitor({ probe, sampleIntervalMs: 50 });

      monitor.start();
      monitor.stop();
      await vi.advanceTimersByTimeAsync(500);

      expect(probe.calls).toBe(2);
    });

    it('should report peak memory and average CPU', () => {
      const probe = scriptedProbe([
        { memoryBytes: 1000, cpuTimeMicros: 0, wallTimeMs: 0 },
        { memoryBytes: 3000, cpuTimeMicros: 50_000, wallTimeMs: 100 },
      ]);
      const monitor = new PerformanceMonitor({ probe });

      monitor.start();
      const measurement = monitor.stop();

      expect(measurement.resourceUsage).toEqual({
        peakMemoryBytes: 3000,
        averageCpuPercent: 50,
        sampleCount: 2,
      });
    });
  });

  describe('degradation', () => {
    it('should degrade instead of throwing when the probe fails', () => {
      const probe: ResourceProbe = {
        sample() {
          throw new Error('cpu counters unavailable');
        },
      };
      const monitor = new PerformanceMonitor({ probe, clock: () => 0 });

      monitor.start();
      const measurement = monitor.stop();

      expect(measurement).toEqual({
        durationMs: 0,
        degraded: true,
        degradedReason: 'cpu counters unavailable',
      });
      expect(measurement.resourceUsage).toBeUndefined();
    });

    it('should degrade when the probe fails mid-run', async () => {
      let calls = 0;
      const probe: ResourceProbe = {
        sample() {
          calls++;
          if (calls > 1) {
            throw new Error('probe lost');
          }
          return { memoryBytes: 1, cpuTimeMicros: 0, wallTimeMs: 0 };
        },
      };
      const monitor = new PerformanceMonitor({ probe, sampleIntervalMs: 10 });

      monitor.start();
      await vi.advanceTimersByTimeAsync(100);
      const measurement = monitor.stop();

      expect(measurement.degraded).toBe(true);
      expect(calls).toBe(2);
    });
  });

  describe('measure', () => {
    it('should return the value and measurement', async () => {
      const monitor = new PerformanceMonitor();

      const { result, measurement } = await monitor.measure(async () => 'done');

      expect(result).toEqual({ status: 'fulfilled', value: 'done' });
      expect(measurement.durationMs).toBeGreaterThanOrEqual(0);
      expect(monitor.isRunning).toBe(false);
    });

    it('should stop the monitor when the call rejects', async () => {
      const monitor = new PerformanceMonitor();
      const failure = new Error('unit crashed');

      const { result } = await monitor.measure(async () => {
        throw failure;
      });

      expect(result).toEqual({ status: 'rejected', reason: failure });
      expect(monitor.isRunning).toBe(false);
    });
  });
});

describe('summarizeSamples', () => {
  it('should average CPU over sample pairs', () => {
    const usage = summarizeSamples([
      { memoryBytes: 10, cpuTimeMicros: 0, wallTimeMs: 0 },
      { memoryBytes: 30, cpuTimeMicros: 100_000, wallTimeMs: 100 },
      { memoryBytes: 20, cpuTimeMicros: 100_000, wallTimeMs: 200 },
    ]);

    expect(usage).toEqual({ peakMemoryBytes: 30, averageCpuPercent: 50, sampleCount: 3 });
  });

  it('should skip pairs with no elapsed wall time', () => {
    const usage = summarizeSamples([
      { memoryBytes: 10, cpuTimeMicros: 0, wallTimeMs: 5 },
      { memoryBytes: 10, cpuTimeMicros: 1000, wallTimeMs: 5 },
    ]);

    expect(usage.averageCpuPercent).toBe(0);
  });
});
