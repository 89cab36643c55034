/**
 * Errors raised while opening datasets and moving files in and out of them
 */

/**
 * Represents a failure in the dataset facade
 */
export class DatasetError extends Error {
  constructor(message?: string, options?: ErrorOptions) {
    super(message, options)
    this.name = "DatasetError"
  }
}

/**
 * The storage locator does not name a supported driver
 */
export class LocatorError extends DatasetError {
  readonly locator: string

  constructor(locator: string, message?: string) {
    super(message ?? `Unsupported store locator ${locator}`)
    this.name = "LocatorError"
    this.locator = locator
  }
}

/**
 * A configuration value could not be used
 */
export class ConfigurationError extends DatasetError {
  readonly key: string

  constructor(key: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = "ConfigurationError"
    this.key = key
  }
}

export function isDatasetError(error: unknown): error is DatasetError {
  return error instanceof DatasetError
}
