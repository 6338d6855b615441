import { EventEmitter } from 'node:events';
import pino from 'pino';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type DetectorLatencyState = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
};

type DetectorMetricState = {
  counters: Map<string, number>;
  lastRunAt: number | null;
  lastErrorAt: number | null;
  lastErrorMessage: string | null;
  latency: DetectorLatencyState | null;
};

type DetectorSnapshot = {
  counters: CounterMap;
  lastRunAt: string | null;
  lastErrorAt: string | null;
  lastErrorMessage: string | null;
  latency: LatencyStats | null;
};

type LogLevelSnapshot = {
  byLevel: CounterMap;
  byDetector: Record<string, CounterMap>;
  currentLevel: string;
  lastLevelChangeAt: string | null;
  levelChanges: CounterMap;
  lastErrorAt: string | null;
  lastErrorMessage: string | null;
};

type MetricsSnapshot = {
  createdAt: string;
  logs: LogLevelSnapshot;
  detectors: Record<string, DetectorSnapshot>;
};

const PINO_LEVEL_ORDER = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

class MetricsRegistry {
  private readonly resetEmitter = new EventEmitter();
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelByDetector = new Map<string, Map<string, number>>();
  private readonly logLevelChangeCounters = new Map<string, number>();
  private readonly detectorMetrics = new Map<string, DetectorMetricState>();
  private currentLogLevel = 'info';
  private lastLogLevelChangeAt: number | null = null;
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;

  reset() {
    this.logLevelCounters.clear();
    this.logLevelByDetector.clear();
    this.logLevelChangeCounters.clear();
    this.detectorMetrics.clear();
    this.currentLogLevel = 'info';
    this.lastLogLevelChangeAt = null;
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.resetEmitter.emit('reset');
  }

  onReset(listener: () => void) {
    this.resetEmitter.on('reset', listener);
    return () => {
      this.resetEmitter.off('reset', listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string; detector?: string }) {
    const normalized = level.toLowerCase();
    if (!(normalized in pino.levels.values)) {
      return;
    }
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (context?.detector) {
      const detectorMap = this.logLevelByDetector.get(context.detector) ?? new Map<string, number>();
      detectorMap.set(normalized, (detectorMap.get(normalized) ?? 0) + 1);
      this.logLevelByDetector.set(context.detector, detectorMap);
    }

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (!previousNormalized || previousNormalized === normalized) {
      return;
    }
    this.lastLogLevelChangeAt = Date.now();
    this.logLevelChangeCounters.set(normalized, (this.logLevelChangeCounters.get(normalized) ?? 0) + 1);
  }

  incrementDetectorCounter(detector: string, counter: string, amount = 1) {
    if (!Number.isFinite(amount)) {
      return;
    }
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    state.counters.set(counter, (state.counters.get(counter) ?? 0) + amount);
    state.lastRunAt = Date.now();
  }

  recordDetectorError(detector: string, message: string) {
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    const now = Date.now();
    state.lastRunAt = now;
    state.lastErrorAt = now;
    state.lastErrorMessage = message;
    state.counters.set('errors', (state.counters.get('errors') ?? 0) + 1);
  }

  observeDetectorLatency(detector: string, durationMs: number) {
    if (!Number.isFinite(durationMs)) {
      return;
    }
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    const latency: DetectorLatencyState = state.latency ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };
    latency.count += 1;
    latency.totalMs += durationMs;
    latency.minMs = Math.min(latency.minMs, durationMs);
    latency.maxMs = Math.max(latency.maxMs, durationMs);
    state.latency = latency;
  }

  exportLogLevelMetrics(): LogLevelSnapshot {
    return {
      byLevel: mapLogLevelCounters(this.logLevelCounters),
      byDetector: mapFromNested(this.logLevelByDetector),
      currentLevel: this.currentLogLevel,
      lastLevelChangeAt: toIso(this.lastLogLevelChangeAt),
      levelChanges: mapFrom(this.logLevelChangeCounters),
      lastErrorAt: toIso(this.lastErrorAt),
      lastErrorMessage: this.lastErrorMessage
    };
  }

  snapshot(): MetricsSnapshot {
    return {
      createdAt: new Date().toISOString(),
      logs: this.exportLogLevelMetrics(),
      detectors: mapFromDetectors(this.detectorMetrics)
    };
  }
}

function mapLogLevelCounters(source: Map<string, number>): CounterMap {
  const result: CounterMap = {};
  for (const level of PINO_LEVEL_ORDER) {
    result[level] = source.get(level) ?? 0;
  }
  return result;
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

function mapFromNested(source: Map<string, Map<string, number>>): Record<string, CounterMap> {
  const result: Record<string, CounterMap> = {};
  const ordered = Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b));
  for (const [key, inner] of ordered) {
    result[key] = mapFrom(inner);
  }
  return result;
}

function mapFromDetectors(source: Map<string, DetectorMetricState>): Record<string, DetectorSnapshot> {
  const result: Record<string, DetectorSnapshot> = {};
  const ordered = Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b));
  for (const [detector, state] of ordered) {
    result[detector] = {
      counters: mapFrom(state.counters),
      lastRunAt: toIso(state.lastRunAt),
      lastErrorAt: toIso(state.lastErrorAt),
      lastErrorMessage: state.lastErrorMessage,
      latency: state.latency
        ? {
            count: state.latency.count,
            totalMs: state.latency.totalMs,
            minMs: state.latency.minMs === Number.POSITIVE_INFINITY ? 0 : state.latency.minMs,
            maxMs: state.latency.maxMs,
            averageMs: state.latency.count === 0 ? 0 : state.latency.totalMs / state.latency.count
          }
        : null
    };
  }
  return result;
}

function getDetectorMetricState(map: Map<string, DetectorMetricState>, detector: string): DetectorMetricState {
  const existing = map.get(detector);
  if (existing) {
    return existing;
  }
  const created: DetectorMetricState = {
    counters: new Map<string, number>(),
    lastRunAt: null,
    lastErrorAt: null,
    lastErrorMessage: null,
    latency: null
  };
  map.set(detector, created);
  return created;
}

function toIso(value: number | null) {
  return value === null ? null : new Date(value).toISOString();
}

const defaultRegistry = new MetricsRegistry();

export type { DetectorSnapshot, LogLevelSnapshot, MetricsSnapshot };
export { MetricsRegistry };
export default defaultRegistry;
