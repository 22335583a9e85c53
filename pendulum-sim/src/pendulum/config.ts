/**
 * Simulation configuration: parsed from plain JSON (config file or
 * CLI flags) into a validated, frozen SimulationConfig.
 */

import { z } from 'zod'
import { pendulumParametersSchema } from './params.ts'
import type { PendulumParameters } from './params.ts'
import type { PendulumState } from './state.ts'
import type { IntegrationMethod } from './integrate.ts'
import { DEFAULT_RTOL, DEFAULT_ATOL, validateTimeSpan } from './integrate.ts'
import { configurationErrorFromZod } from './errors.ts'

// ─── Defaults ────────────────────────────────────────────────────────────────

/** Both arms near horizontal, arm 2 offset by 0.1 rad; strongly chaotic */
export const DEFAULT_INITIAL_STATE: PendulumState = Object.freeze({
  theta1: Math.PI / 2,
  omega1: 0,
  theta2: Math.PI / 2 + 0.1,
  omega2: 0,
})

export const DEFAULT_T_SPAN = 20
export const DEFAULT_DT = 0.02

// ─── Types ───────────────────────────────────────────────────────────────────

export interface SimulationConfig {
  readonly params: PendulumParameters
  readonly initialState: Readonly<PendulumState>
  readonly tSpan: number
  readonly dt: number
  readonly method: IntegrationMethod
  readonly rtol: number
  readonly atol: number
  readonly maxSteps?: number
  readonly deadlineMs?: number
}

// ─── Schema ──────────────────────────────────────────────────────────────────

const finite = (what: string) =>
  z.number({ invalid_type_error: `${what} must be a number` }).finite(`${what} must be finite`)

const STATE_KEYS = ['theta1', 'omega1', 'theta2', 'omega2'] as const

const stateObjectSchema = z.object({
  theta1: finite('angle'),
  omega1: finite('angular velocity'),
  theta2: finite('angle'),
  omega2: finite('angular velocity'),
}, {
  invalid_type_error: 'expected {theta1, omega1, theta2, omega2} or [θ1, ω1, θ2, ω2]',
}).strict()

/** [θ1, ω1, θ2, ω2] → {theta1, omega1, theta2, omega2}; anything else passes through */
function stateTupleToObject(value: unknown): unknown {
  if (!Array.isArray(value) || value.length !== STATE_KEYS.length) return value
  const items: readonly unknown[] = value
  return Object.fromEntries(STATE_KEYS.map((key, i) => [key, items[i]]))
}

/**
 * Accepts either form; both are checked against the object schema so an
 * issue names the component, e.g. `initialState.omega1`.
 */
const initialStateSchema = z.preprocess(stateTupleToObject, stateObjectSchema)

export const simulationConfigSchema = z.object({
  params: pendulumParametersSchema.default({}),
  initialState: initialStateSchema.default({ ...DEFAULT_INITIAL_STATE }),
  tSpan: finite('tSpan').positive('tSpan must be > 0').default(DEFAULT_T_SPAN),
  dt: finite('dt').positive('dt must be > 0').default(DEFAULT_DT),
  method: z.enum(['dopri5', 'rk4']).default('dopri5'),
  rtol: finite('rtol').positive('rtol must be > 0').default(DEFAULT_RTOL),
  atol: finite('atol').positive('atol must be > 0').default(DEFAULT_ATOL),
  maxSteps: z.number().int('maxSteps must be an integer').positive('maxSteps must be > 0').optional(),
  deadlineMs: finite('deadlineMs').nonnegative('deadlineMs must be ≥ 0').optional(),
}).strict()

export type SimulationConfigInput = z.input<typeof simulationConfigSchema>

// ─── Parsing ─────────────────────────────────────────────────────────────────

/** Same input with a tuple initial state in object form, for error values */
function withStateObject(input: unknown): unknown {
  if (input === null || typeof input !== 'object' || !('initialState' in input)) return input
  return { ...input, initialState: stateTupleToObject(input.initialState) }
}

/**
 * Validate raw configuration and fill defaults.
 *
 * @throws ConfigurationError naming the first offending field
 *   (`params.m2`, `initialState.theta1`, `tSpan`, `dt`, …)
 */
export function parseSimulationConfig(input: unknown = {}): SimulationConfig {
  const result = simulationConfigSchema.safeParse(input)
  if (!result.success) throw configurationErrorFromZod(result.error, withStateObject(input))

  const { params, initialState, ...rest } = result.data
  validateTimeSpan(rest)

  return Object.freeze({
    ...rest,
    params: Object.freeze(params),
    initialState: Object.freeze(initialState),
  })
}
