/**
 * Trajectory integrator: drives the pendulum derivative function
 * through an ODE solver and records the state on a fixed output grid.
 *
 * Output grid: n = round(tSpan / dt) samples at t_i = i·dt, i = 0 … n−1
 * (the half-open range [0, tSpan) stepped by dt).
 */

import type { PendulumParameters } from './params.ts'
import type { PendulumState, Trajectory, TrajectorySample } from './state.ts'
import { stateToTuple, tupleToState, isFiniteState } from './state.ts'
import { computeDerivatives, rk4Step } from './sim.ts'
import { solveDopri5 } from './dopri5.ts'
import type { OdeFunction, SolverFailure, SolverStats } from './dopri5.ts'
import { ConfigurationError, DomainError, assertConfig } from './errors.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

export type IntegrationMethod = 'dopri5' | 'rk4'

export interface TimeSpan {
  /** Total simulated time [s] */
  tSpan: number
  /** Output sampling interval [s]; should resolve the fastest oscillation */
  dt: number
}

export interface IntegrateOptions {
  /** Solver (default 'dopri5') */
  method?: IntegrationMethod
  /** Relative tolerance for dopri5 (default 1e-9) */
  rtol?: number
  /** Absolute tolerance for dopri5 (default 1e-9) */
  atol?: number
  /** RK4 steps per output interval (default 10) */
  substeps?: number
  /** Abort with DomainError('max-steps') after this many accepted steps */
  maxSteps?: number
  /** Wall-clock budget [ms], measured with `now` from the start of the call */
  deadlineMs?: number
  /** Clock [ms] used for the deadline (default Date.now) */
  now?: () => number
  /** Called once per recorded sample */
  onProgress?: (t: number, steps: number) => void
}

export interface IntegrationResult {
  trajectory: Trajectory
  stats: SolverStats
  method: IntegrationMethod
}

export const DEFAULT_RTOL = 1e-9
export const DEFAULT_ATOL = 1e-9
export const DEFAULT_RK4_SUBSTEPS = 10

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Check time parameters and the initial state before any work.
 *
 * @throws ConfigurationError naming the offending field
 */
export function validateTimeSpan(span: TimeSpan): void {
  const { tSpan, dt } = span
  assertConfig(Number.isFinite(tSpan) && tSpan > 0, 'tSpan', tSpan, 'must be a finite number > 0')
  assertConfig(Number.isFinite(dt) && dt > 0, 'dt', dt, 'must be a finite number > 0')
  assertConfig(dt <= tSpan, 'dt', dt, `must not exceed tSpan (${tSpan})`)
}

function validateInitialState(state: PendulumState): void {
  for (const key of ['theta1', 'omega1', 'theta2', 'omega2'] as const) {
    if (!Number.isFinite(state[key])) {
      throw new ConfigurationError(`initialState.${key}`, state[key], 'must be a finite number')
    }
  }
}

function validateOptions(options: IntegrateOptions): void {
  const { rtol, atol, substeps, maxSteps, deadlineMs } = options
  if (rtol !== undefined) assertConfig(Number.isFinite(rtol) && rtol > 0, 'rtol', rtol, 'must be > 0')
  if (atol !== undefined) assertConfig(Number.isFinite(atol) && atol > 0, 'atol', atol, 'must be > 0')
  if (substeps !== undefined) assertConfig(Number.isInteger(substeps) && substeps > 0, 'substeps', substeps, 'must be a positive integer')
  if (maxSteps !== undefined) assertConfig(Number.isInteger(maxSteps) && maxSteps > 0, 'maxSteps', maxSteps, 'must be a positive integer')
  if (deadlineMs !== undefined) assertConfig(deadlineMs >= 0, 'deadlineMs', deadlineMs, 'must be ≥ 0')
}

// ─── Output Grid ─────────────────────────────────────────────────────────────

/** t_i = i·dt for i < round(tSpan/dt) */
export function sampleTimes(span: TimeSpan): number[] {
  const n = Math.max(1, Math.round(span.tSpan / span.dt))
  const times: number[] = []
  for (let i = 0; i < n; i++) times.push(i * span.dt)
  return times
}

// ─── Driver ──────────────────────────────────────────────────────────────────

function freezeSample(t: number, state: PendulumState): TrajectorySample {
  return Object.freeze({ t, state: Object.freeze({ ...state }) })
}

function makeStopCheck(options: IntegrateOptions): (t: number, steps: number) => SolverFailure | null {
  const { maxSteps, deadlineMs } = options
  const now = options.now ?? Date.now
  const startedAt = now()

  return (_t, steps) => {
    if (maxSteps !== undefined && steps >= maxSteps) {
      return { reason: 'max-steps', message: `exceeded ${maxSteps} integration steps` }
    }
    if (deadlineMs !== undefined && now() - startedAt > deadlineMs) {
      return { reason: 'deadline', message: `exceeded deadline of ${deadlineMs} ms` }
    }
    return null
  }
}

/**
 * Integrate and return the trajectory together with solver statistics.
 *
 * @throws ConfigurationError for invalid time parameters, initial state
 *   or options (before integration starts)
 * @throws DomainError on step underflow, divergence, step budget or
 *   deadline; `partial` holds every sample recorded before the failure
 */
export function integrateWithStats(
  params: PendulumParameters,
  initialState: PendulumState,
  span: TimeSpan,
  options: IntegrateOptions = {},
): IntegrationResult {
  validateTimeSpan(span)
  validateInitialState(initialState)
  validateOptions(options)

  const method = options.method ?? 'dopri5'
  const times = sampleTimes(span)
  const shouldStop = makeStopCheck(options)

  if (method === 'rk4') {
    return { ...integrateRk4(params, initialState, times, span.dt, options, shouldStop), method }
  }

  const samples: TrajectorySample[] = []

  // A stage state that overflowed is reported as NaN so the solver treats
  // it as divergence instead of the model seeing a non-finite angle.
  const f: OdeFunction = (_t, y) => {
    const state = tupleToState(y)
    if (!isFiniteState(state)) return [Number.NaN, Number.NaN, Number.NaN, Number.NaN]
    const d = computeDerivatives(state, params)
    return [d.theta1Dot, d.omega1Dot, d.theta2Dot, d.omega2Dot]
  }

  const result = solveDopri5(f, stateToTuple(initialState), times, {
    rtol: options.rtol ?? DEFAULT_RTOL,
    atol: options.atol ?? DEFAULT_ATOL,
    maxStep: span.dt,
    shouldStop,
    onSample: (t, y, steps) => {
      samples.push(freezeSample(t, tupleToState(y)))
      options.onProgress?.(t, steps)
    },
  })

  const trajectory = Object.freeze(samples)
  if (result.failure) {
    throw new DomainError(result.failure.reason, result.failure.message, result.t, trajectory)
  }
  return { trajectory, stats: result.stats, method }
}

function integrateRk4(
  params: PendulumParameters,
  initialState: PendulumState,
  times: readonly number[],
  dt: number,
  options: IntegrateOptions,
  shouldStop: (t: number, steps: number) => SolverFailure | null,
): Omit<IntegrationResult, 'method'> {
  const substeps = options.substeps ?? DEFAULT_RK4_SUBSTEPS
  const h = dt / substeps
  const stats: SolverStats = { steps: 0, rejected: 0, evaluations: 0 }
  const samples: TrajectorySample[] = [freezeSample(0, initialState)]
  options.onProgress?.(0, 0)

  let state = initialState
  let t = 0

  for (let idx = 1; idx < times.length; idx++) {
    const target = times[idx] ?? t
    for (let s = 0; s < substeps; s++) {
      const stop = shouldStop(t, stats.steps)
      if (stop) throw new DomainError(stop.reason, stop.message, t, Object.freeze(samples))

      const next = rk4Step(state, params, h)
      stats.steps++
      stats.evaluations += 4
      if (!isFiniteState(next)) {
        throw new DomainError('divergence', 'solution became non-finite', t, Object.freeze(samples))
      }
      state = next
      t += h
    }
    t = target
    samples.push(freezeSample(t, state))
    options.onProgress?.(t, stats.steps)
  }

  return { trajectory: Object.freeze(samples), stats }
}

/**
 * Solve the initial-value problem over [0, tSpan) and return the
 * sampled trajectory.  See integrateWithStats for errors.
 */
export function integrateTrajectory(
  params: PendulumParameters,
  initialState: PendulumState,
  span: TimeSpan,
  options: IntegrateOptions = {},
): Trajectory {
  return integrateWithStats(params, initialState, span, options).trajectory
}
