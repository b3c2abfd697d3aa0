import {
  AggregationTemporality,
  InMemoryMetricExporter,
} from "@opentelemetry/sdk-metrics"
import {
  enableDrillMetrics,
  getDrillMeter,
  startDrillMetrics,
} from "./metrics.js"

describe("drill metrics", () => {
  it("should hand out a usable meter before metrics are started", () => {
    enableDrillMetrics()
    expect(() =>
      getDrillMeter().createCounter("test_counter").add(1, { "test.case": "noop" }),
    ).not.toThrow()
  })

  it("should export what the shared meter records", async () => {
    const exporter = new InMemoryMetricExporter(
      AggregationTemporality.CUMULATIVE,
    )
    const provider = startDrillMetrics({ exporter })

    getDrillMeter()
      .createCounter("exercise_outcome")
      .add(2, { "exercise.status": "pass" })
    await provider.shutdown()

    const exported = exporter
      .getMetrics()
      .flatMap((r) => r.scopeMetrics)
      .flatMap((s) => s.metrics)
      .filter((m) => m.descriptor.name === "exercise_outcome")

    expect(exported).toHaveLength(1)
    const points: readonly { attributes: unknown; value: unknown }[] =
      exported[0].dataPoints
    expect(points.map((p) => [p.attributes, p.value])).toEqual([
      [{ "exercise.status": "pass" }, 2],
    ])
  })
})
