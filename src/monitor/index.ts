/**
 * Performance monitoring
 */

export {
  PerformanceMonitor,
  summarizeSamples,
  type PerformanceMonitorOptions,
  type Measurement,
  type MeasuredResult,
} from './performance-monitor.js';

export { ProcessResourceProbe, type ResourceProbe, type ResourceSample } from './resource-probe.js';
