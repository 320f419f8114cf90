import { Registry } from 'prom-client';
import { MetricsController } from './metrics.controller';
import { ServiceMetrics } from './service-metrics';

describe('MetricsController', () => {
  it('exposes the service counters in Prometheus text format', async () => {
    const registry = new Registry();
    const metrics = new ServiceMetrics(registry);
    metrics.recordCacheLookup('hit');
    metrics.recordCacheLookup('hit');
    metrics.recordChatRequest('websocket');

    const output = await new MetricsController(registry).getMetrics();

    expect(output).toContain('headline_cache_lookups_total{result="hit"} 2');
    expect(output).toContain('chat_requests_total{transport="websocket"} 1');
  });
});
