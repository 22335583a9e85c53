/**
 * Physical parameters of the double pendulum.
 *
 * Created once per run, frozen, and passed explicitly into every core
 * function.  There is no module-level mutable configuration.
 */

import { z } from 'zod'
import { configurationErrorFromZod } from './errors.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

export interface PendulumParameters {
  /** Arm 1 length, pivot → joint [m] */
  readonly L1: number
  /** Arm 2 length, joint → bob [m] */
  readonly L2: number
  /** Joint mass [kg] */
  readonly m1: number
  /** Bob mass [kg] */
  readonly m2: number
  /** Gravitational acceleration [m/s²] */
  readonly g: number
}

// ─── Defaults ────────────────────────────────────────────────────────────────

export const STANDARD_GRAVITY = 9.81

export const DEFAULT_PARAMETERS: PendulumParameters = Object.freeze({
  L1: 1.0,
  L2: 1.0,
  m1: 1.0,
  m2: 1.0,
  g: STANDARD_GRAVITY,
})

// ─── Validation ──────────────────────────────────────────────────────────────

const positive = (what: string) =>
  z.number({ invalid_type_error: `${what} must be a number` })
    .finite(`${what} must be finite`)
    .positive(`${what} must be > 0`)

export const pendulumParametersSchema = z.object({
  L1: positive('arm length').default(DEFAULT_PARAMETERS.L1),
  L2: positive('arm length').default(DEFAULT_PARAMETERS.L2),
  m1: positive('mass').default(DEFAULT_PARAMETERS.m1),
  m2: positive('mass').default(DEFAULT_PARAMETERS.m2),
  g: positive('gravity').default(DEFAULT_PARAMETERS.g),
}).strict()

/**
 * Build a validated, frozen parameter set.  Missing fields take the
 * defaults (1 m, 1 kg, 9.81 m/s²).
 *
 * @throws ConfigurationError naming the first invalid field (`params.L1`, …)
 */
export function createParameters(input: Partial<PendulumParameters> = {}): PendulumParameters {
  const result = pendulumParametersSchema.safeParse(input)
  if (!result.success) throw configurationErrorFromZod(result.error, input, 'params')
  return Object.freeze(result.data)
}
