import { MetricCollector, TelemetryEvent, telemetryBus } from '@telemetry/index';

describe('Telemetry', () => {
  afterEach(() => {
    telemetryBus.removeAllListeners();
  });

  it('accumulates counters into a detached snapshot', () => {
    const collector = new MetricCollector();
    collector.incrementCounter('ingest_json');
    collector.incrementCounter('ingest_json');
    collector.incrementCounter('http_400', 3);

    const snapshot = collector.snapshot();
    expect(snapshot).toEqual({ ingest_json: 2, http_400: 3 });
    snapshot.ingest_json = 99;
    expect(collector.snapshot().ingest_json).toBe(2);
  });

  it('publishes events under their type', () => {
    const received: TelemetryEvent[] = [];
    telemetryBus.on('ingest.failed', (event: TelemetryEvent) => received.push(event));
    const event: TelemetryEvent = { type: 'ingest.failed', payload: { filename: 'a.bin', error: 'unsupported' } };
    telemetryBus.publish(event);
    expect(received).toEqual([event]);
  });
});
