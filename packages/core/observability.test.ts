import { SpanStatusCode } from "@opentelemetry/api"
import { enableRowkitMetrics, getDataMetrics } from "./observability/metrics"
import { traced } from "./observability/tracing"

describe("Observability", () => {
  it("Should return the result of traced work", async () => {
    await expect(
      traced("test.work", { "table.name": "t" }, (span) => {
        span.setAttribute("rows", 1)
        return 42
      }),
    ).resolves.toBe(42)
  })

  it("Should mark failed spans and rethrow", async () => {
    const statuses: number[] = []

    await expect(
      traced("test.failure", {}, (span) => {
        const setStatus = span.setStatus.bind(span)
        span.setStatus = (status) => {
          statuses.push(status.code)
          return setStatus(status)
        }

        throw new Error("boom")
      }),
    ).rejects.toThrow("boom")
    expect(statuses).toEqual([SpanStatusCode.ERROR])
  })

  it("Should reuse instruments while the meter is unchanged", () => {
    const metrics = getDataMetrics()
    expect(getDataMetrics()).toBe(metrics)

    enableRowkitMetrics()
    getDataMetrics().rowsWritten.add(1, { table: "t" })
    getDataMetrics().transferDuration.record(0.5, { direction: "export" })
  })
})
