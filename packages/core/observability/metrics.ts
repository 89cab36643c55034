/**
 * Metrics for the data packages, a NO_OP unless {@link enableRowkitMetrics}
 * is invoked
 */

import opentelemetry, {
  ValueType,
  createNoopMeter,
  type Counter,
  type Histogram,
  type Meter,
} from "@opentelemetry/api"
import type { Optional } from "../type/utils"
import { ROWKIT_VERSION } from "../version"

let _metricsEnabled = false
let _meter: Meter = createNoopMeter()

export function getRowkitMeter(): Meter {
  return _meter
}

/**
 * Switch from the no-op meter to the globally registered provider
 */
export function enableRowkitMetrics(): void {
  if (!_metricsEnabled) {
    _meter = opentelemetry.metrics
      .getMeterProvider()
      .getMeter("rowkit-metrics", ROWKIT_VERSION)
  }
  _metricsEnabled = true
}

/**
 * Instruments shared by the store and format packages
 */
export interface DataMetrics {
  /** Rows written by insert, update and upsert */
  readonly rowsWritten: Counter
  /** Rows removed by delete */
  readonly rowsDeleted: Counter
  /** Duration of exports and imports */
  readonly transferDuration: Histogram
}

let _instruments: Optional<{ meter: Meter; metrics: DataMetrics }>

/**
 * @returns The {@link DataMetrics} bound to the current meter
 */
export function getDataMetrics(): DataMetrics {
  if (_instruments === undefined || _instruments.meter !== _meter) {
    _instruments = {
      meter: _meter,
      metrics: {
        rowsWritten: _meter.createCounter("rows_written", {
          description: "The number of rows inserted or modified",
          valueType: ValueType.INT,
        }),
        rowsDeleted: _meter.createCounter("rows_deleted", {
          description: "The number of rows removed",
          valueType: ValueType.INT,
        }),
        transferDuration: _meter.createHistogram("transfer_duration", {
          description: "The amount of time an export or import took",
          unit: "seconds",
          valueType: ValueType.DOUBLE,
          advice: {
            explicitBucketBoundaries: [
              0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 10,
            ],
          },
        }),
      },
    }
  }

  return _instruments.metrics
}
