import pino from 'pino';
import EventEmitter from 'eventemitter3';

const quiet = process.env.NODE_ENV === 'test';

export const logger = pino({
  level: process.env.LOG_LEVEL || (quiet ? 'silent' : 'info'),
  transport:
    process.env.NODE_ENV === 'production' || quiet
      ? undefined
      : {
          target: 'pino-pretty',
          options: { colorize: true },
        },
});

export type MetricSample = Record<string, number>;

/** Named counters served by `/metrics`. */
export class MetricCollector {
  private counters: MetricSample = {};

  incrementCounter(name: string, delta = 1) {
    this.counters[name] = (this.counters[name] ?? 0) + delta;
  }

  snapshot(): MetricSample {
    return { ...this.counters };
  }
}

export const metrics = new MetricCollector();

export type TelemetryEvent =
  | {
      type: 'ingest.completed';
      payload: { filename: string; kind: string; indexId: number; location: string };
    }
  | { type: 'ingest.failed'; payload: { filename: string; error: string; code?: string } }
  | {
      type: 'schema.applied';
      payload: { schemaName: string; storageType: string; backend: string; attempts: number };
    };

class TelemetryBus extends EventEmitter {
  publish(event: TelemetryEvent) {
    this.emit(event.type, event);
  }
}

export const telemetryBus = new TelemetryBus();
