/** Version reported by the tracer and meter */
export const ROWKIT_VERSION = "0.1.0"
