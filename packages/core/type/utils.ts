/**
 * Type helpers used throughout the packages
 */

import type { MaybeAwaitable } from "../index"

/**
 * A value of type {@link T} or undefined
 */
export type Optional<T = unknown> = T | undefined

/**
 * A function that provides a value
 */
export type Provider<T> = () => MaybeAwaitable<T>
