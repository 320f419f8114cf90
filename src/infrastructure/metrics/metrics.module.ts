import { Global, Module } from '@nestjs/common';
import { collectDefaultMetrics, Registry } from 'prom-client';
import { MetricsController } from './metrics.controller';
import { METRICS_REGISTRY, ServiceMetrics } from './service-metrics';

/**
 * Shared Prometheus registry with process metrics and the service counters.
 */
@Global()
@Module({
  controllers: [MetricsController],
  providers: [
    {
      provide: METRICS_REGISTRY,
      useFactory: () => {
        const registry = new Registry();
        collectDefaultMetrics({ register: registry });
        return registry;
      },
    },
    ServiceMetrics,
  ],
  exports: [METRICS_REGISTRY, ServiceMetrics],
})
export class MetricsModule {}
