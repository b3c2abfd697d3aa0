/**
 * Helps to bootstrap the metrics for the harness
 */

import {
  createNoopMeter,
  metrics,
  type Meter,
  type MeterProvider as MeterProviderApi,
} from "@opentelemetry/api"
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-proto"
import {
  MeterProvider,
  PeriodicExportingMetricReader,
  type PushMetricExporter,
} from "@opentelemetry/sdk-metrics"
import { SQL_DRILL_VERSION } from "../version.js"

let _meter: Meter = createNoopMeter()

/**
 * Get the shared meter. Instruments created before {@link enableDrillMetrics}
 * stay no-ops, so create them lazily where the values matter.
 */
export function getDrillMeter(): Meter {
  return _meter
}

/**
 * Switch the shared meter to the provider, the globally registered one by
 * default
 */
export function enableDrillMetrics(
  provider: MeterProviderApi = metrics.getMeterProvider(),
): void {
  _meter = provider.getMeter("sql-drill", SQL_DRILL_VERSION)
}

export interface DrillMetricsOptions {
  /** Defaults to OTLP over http, see OTEL_EXPORTER_OTLP_METRICS_ENDPOINT */
  exporter?: PushMetricExporter
  exportIntervalMillis?: number
}

/**
 * Register a {@link MeterProvider} that exports periodically and point the
 * shared meter at it. Shut the provider down to flush what is left.
 */
export function startDrillMetrics(options?: DrillMetricsOptions): MeterProvider {
  const provider = new MeterProvider({
    readers: [
      new PeriodicExportingMetricReader({
        exporter: options?.exporter ?? new OTLPMetricExporter(),
        exportIntervalMillis: options?.exportIntervalMillis ?? 60_000,
      }),
    ],
  })

  metrics.setGlobalMeterProvider(provider)
  enableDrillMetrics(provider)
  return provider
}
