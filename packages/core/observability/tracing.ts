import {
  SpanStatusCode,
  trace as Tracing,
  type Attributes,
  type Span,
  type Tracer,
} from "@opentelemetry/api"
import type { MaybeAwaitable } from "../index"
import type { Optional } from "../type/utils"
import { ROWKIT_VERSION } from "../version"

/**
 * Tracer for the packages, resolved on first use so a provider registered
 * during startup is picked up
 */
let FRAMEWORK_TRACER: Optional<Tracer>

/**
 * Return the framework {@link Tracer}
 */
export function getTracer(): Tracer {
  return (
    FRAMEWORK_TRACER ??
    (FRAMEWORK_TRACER = Tracing.getTracer("rowkit", ROWKIT_VERSION))
  )
}

/**
 * Runs the work inside an active {@link Span}, recording failures on the span
 * before they propagate
 *
 * @param name The span name
 * @param attributes The {@link Attributes} to start the span with
 * @param work The work to run
 * @returns The result of the work
 */
export function traced<T>(
  name: string,
  attributes: Attributes,
  work: (span: Span) => MaybeAwaitable<T>,
): Promise<T> {
  return getTracer().startActiveSpan(name, { attributes }, async (span) => {
    try {
      return await work(span)
    } catch (err) {
      span.recordException(err instanceof Error ? err : String(err))
      span.setStatus({ code: SpanStatusCode.ERROR })
      throw err
    } finally {
      span.end()
    }
  })
}
