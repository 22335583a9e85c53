/**
 * Error taxonomy for the pendulum core.
 *
 * ConfigurationError: bad input, raised before any integration work.
 * DomainError: numerical failure during integration, carrying what was
 * computed up to that point.
 */

import type { ZodError } from 'zod'
import type { Trajectory } from './state.ts'

export class ConfigurationError extends Error {
  /** Dotted path of the offending field, e.g. `params.L1` or `tSpan` */
  readonly field: string
  readonly value: unknown

  constructor(field: string, value: unknown, message: string) {
    super(`${field}: ${message}`)
    this.name = 'ConfigurationError'
    this.field = field
    this.value = value
  }
}

export type DomainErrorReason =
  | 'step-underflow'
  | 'divergence'
  | 'max-steps'
  | 'deadline'
  | 'singular'

export class DomainError extends Error {
  readonly reason: DomainErrorReason
  /** Last time [s] the solver reached with a valid state */
  readonly lastTime: number
  /** Output samples produced before the failure (at least the initial one) */
  readonly partial: Trajectory

  constructor(reason: DomainErrorReason, message: string, lastTime: number, partial: Trajectory = []) {
    super(`${message} (t = ${lastTime.toFixed(4)} s, ${partial.length} samples)`)
    this.name = 'DomainError'
    this.reason = reason
    this.lastTime = lastTime
    this.partial = partial
  }
}

export function assertConfig(condition: unknown, field: string, value: unknown, message: string): asserts condition {
  if (!condition) {
    throw new ConfigurationError(field, value, message)
  }
}

/**
 * Convert the first zod issue into a ConfigurationError naming its field.
 *
 * @param error   Failed parse result
 * @param input   The value that was parsed (used to report the offending value)
 * @param prefix  Path prefix for nested schemas, e.g. `params`
 */
export function configurationErrorFromZod(error: ZodError, input: unknown, prefix?: string): ConfigurationError {
  const issue = error.issues[0]
  if (!issue) return new ConfigurationError(prefix ?? 'config', input, 'invalid configuration')
  const path = [...(prefix ? [prefix] : []), ...issue.path.map(String)]
  return new ConfigurationError(path.join('.') || 'config', valueAt(input, issue.path), issue.message)
}

function valueAt(input: unknown, path: readonly (string | number)[]): unknown {
  let current = input
  for (const key of path) {
    if (current === null || typeof current !== 'object') return undefined
    const entry = Object.entries(current).find(([k]) => k === String(key))
    current = entry?.[1]
  }
  return current
}
