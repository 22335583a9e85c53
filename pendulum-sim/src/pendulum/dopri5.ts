/**
 * Dormand–Prince 5(4) embedded Runge–Kutta solver.
 *
 * Generic over plain number vectors so it stays independent of the
 * pendulum model.  Adaptive step with error control; the solution is
 * reported at caller-supplied output times by clipping the step that
 * would cross each one.
 *
 * Reference: Hairer, Nørsett & Wanner, "Solving Ordinary Differential
 * Equations I", §II.4–II.5 (DOPRI5 tableau, step control, initial step).
 */

import type { DomainErrorReason } from './errors.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

/** Right-hand side y' = f(t, y) */
export type OdeFunction = (t: number, y: readonly number[]) => number[]

export interface Dopri5Options {
  /** Relative tolerance */
  rtol: number
  /** Absolute tolerance */
  atol: number
  /** First trial step [s]; estimated from f when omitted */
  initialStep?: number
  /** Upper bound on any step [s] */
  maxStep?: number
  /**
   * Polled before every step attempt.  Returning a failure ends the
   * solve with that failure and the samples reached so far.
   */
  shouldStop?: (t: number, steps: number) => SolverFailure | null
  /** Called once per output time, after the sample is recorded, with the accepted step count */
  onSample?: (t: number, y: readonly number[], steps: number) => void
}

export interface SolverFailure {
  reason: DomainErrorReason
  message: string
}

export interface SolverStats {
  /** Accepted steps */
  steps: number
  /** Rejected step attempts */
  rejected: number
  /** Right-hand-side evaluations */
  evaluations: number
}

export interface Dopri5Result {
  /** One row per output time reached, starting with y0 */
  ys: number[][]
  stats: SolverStats
  /** Last time with a valid state */
  t: number
  failure?: SolverFailure
}

export interface Dopri5Step {
  /** 5th-order solution at t + h */
  y: number[]
  /** f(t + h, y); reused as k1 of the next step (FSAL) */
  dydt: number[]
  /** Difference between the 5th- and 4th-order solutions */
  error: number[]
}

// ─── Butcher Tableau ────────────────────────────────────────────────────────

const C2 = 1 / 5, C3 = 3 / 10, C4 = 4 / 5, C5 = 8 / 9

const A21 = 1 / 5
const A31 = 3 / 40, A32 = 9 / 40
const A41 = 44 / 45, A42 = -56 / 15, A43 = 32 / 9
const A51 = 19372 / 6561, A52 = -25360 / 2187, A53 = 64448 / 6561, A54 = -212 / 729
const A61 = 9017 / 3168, A62 = -355 / 33, A63 = 46732 / 5247, A64 = 49 / 176, A65 = -5103 / 18656
// 5th-order weights (also row 7 of A)
const B1 = 35 / 384, B3 = 500 / 1113, B4 = 125 / 192, B5 = -2187 / 6784, B6 = 11 / 84

// b − b̂ (5th minus embedded 4th order)
const E1 = 71 / 57600, E3 = -71 / 16695, E4 = 71 / 1920, E5 = -17253 / 339200, E6 = 22 / 525, E7 = -1 / 40

// ─── Step Control Constants ─────────────────────────────────────────────────

const SAFETY = 0.9
const MIN_FACTOR = 0.2
const MAX_FACTOR = 5
/** Steps below 16 ulp of the current time cannot advance t reliably */
const UNDERFLOW_ULPS = 16

// ─── Single Step ────────────────────────────────────────────────────────────

function combine(y: readonly number[], h: number, terms: readonly (readonly [number, readonly number[]])[]): number[] {
  const out = y.slice()
  for (let i = 0; i < out.length; i++) {
    let acc = 0
    for (const [coef, k] of terms) acc += coef * (k[i] ?? 0)
    out[i] = (out[i] ?? 0) + h * acc
  }
  return out
}

/**
 * One Dormand–Prince step of size h from (t, y) with k1 = f(t, y).
 * Six new evaluations of f.
 */
export function dopri5Step(
  f: OdeFunction,
  t: number,
  y: readonly number[],
  k1: readonly number[],
  h: number,
): Dopri5Step {
  const k2 = f(t + C2 * h, combine(y, h, [[A21, k1]]))
  const k3 = f(t + C3 * h, combine(y, h, [[A31, k1], [A32, k2]]))
  const k4 = f(t + C4 * h, combine(y, h, [[A41, k1], [A42, k2], [A43, k3]]))
  const k5 = f(t + C5 * h, combine(y, h, [[A51, k1], [A52, k2], [A53, k3], [A54, k4]]))
  const k6 = f(t + h, combine(y, h, [[A61, k1], [A62, k2], [A63, k3], [A64, k4], [A65, k5]]))
  const y5 = combine(y, h, [[B1, k1], [B3, k3], [B4, k4], [B5, k5], [B6, k6]])
  const k7 = f(t + h, y5)

  const zero = y.map(() => 0)
  const error = combine(zero, h, [[E1, k1], [E3, k3], [E4, k4], [E5, k5], [E6, k6], [E7, k7]])

  return { y: y5, dydt: k7, error }
}

// ─── Error Norm ─────────────────────────────────────────────────────────────

/**
 * RMS of the local error scaled by atol + rtol·max(|y0|, |y1|).
 * A step is acceptable when the norm is ≤ 1.
 */
export function errorNorm(
  error: readonly number[],
  y0: readonly number[],
  y1: readonly number[],
  rtol: number,
  atol: number,
): number {
  let sum = 0
  for (let i = 0; i < error.length; i++) {
    const scale = atol + rtol * Math.max(Math.abs(y0[i] ?? 0), Math.abs(y1[i] ?? 0))
    const e = (error[i] ?? 0) / scale
    sum += e * e
  }
  return Math.sqrt(sum / Math.max(error.length, 1))
}

/** Step size multiplier for a given error norm. */
export function stepFactor(err: number): number {
  if (!Number.isFinite(err)) return MIN_FACTOR
  if (err === 0) return MAX_FACTOR
  return Math.min(MAX_FACTOR, Math.max(MIN_FACTOR, SAFETY * Math.pow(err, -1 / 5)))
}

// ─── Initial Step ───────────────────────────────────────────────────────────

/**
 * Starting step estimate (Hairer II.4): one explicit Euler probe to
 * gauge the second derivative.  Costs one evaluation of f.
 */
export function initialStepSize(
  f: OdeFunction,
  t0: number,
  y0: readonly number[],
  f0: readonly number[],
  rtol: number,
  atol: number,
): number {
  const n = Math.max(y0.length, 1)
  const scale = y0.map(v => atol + Math.abs(v) * rtol)
  const rms = (v: readonly number[]) =>
    Math.sqrt(v.reduce((acc, x, i) => acc + (x / (scale[i] ?? 1)) ** 2, 0) / n)

  const d0 = rms(y0)
  const d1 = rms(f0)
  const h0 = d0 < 1e-5 || d1 < 1e-5 ? 1e-6 : 0.01 * d0 / d1

  const f1 = f(t0 + h0, combine(y0, h0, [[1, f0]]))
  const d2 = rms(f1.map((v, i) => v - (f0[i] ?? 0))) / h0

  const dMax = Math.max(d1, d2)
  const h1 = dMax <= 1e-15 ? Math.max(1e-6, h0 * 1e-3) : Math.pow(0.01 / dMax, 1 / 5)
  return Math.min(100 * h0, h1)
}

// ─── Driver ─────────────────────────────────────────────────────────────────

function allFinite(v: readonly number[]): boolean {
  return v.every(Number.isFinite)
}

/**
 * Integrate y' = f(t, y) from times[0] through every later output time.
 *
 * Steps that would cross the next output time are clipped to land on it
 * exactly; the controller's proposed step survives the clip.  Never
 * throws for numerical trouble: a failure is returned together with the
 * samples reached before it.
 *
 * @param f      Right-hand side
 * @param y0     State at times[0]
 * @param times  Strictly increasing output times
 */
export function solveDopri5(
  f: OdeFunction,
  y0: readonly number[],
  times: readonly number[],
  options: Dopri5Options,
): Dopri5Result {
  const { rtol, atol, maxStep = Number.POSITIVE_INFINITY, shouldStop, onSample } = options
  const stats: SolverStats = { steps: 0, rejected: 0, evaluations: 0 }

  const rhs: OdeFunction = (t, y) => {
    stats.evaluations++
    return f(t, y)
  }

  let t = times[0] ?? 0
  let y = y0.slice()
  const ys: number[][] = [y.slice()]
  onSample?.(t, y, stats.steps)
  if (times.length < 2) return { ys, stats, t }

  let k1 = rhs(t, y)
  if (!allFinite(y) || !allFinite(k1)) {
    return { ys, stats, t, failure: { reason: 'divergence', message: 'non-finite initial state or derivative' } }
  }

  let h = Math.min(options.initialStep ?? initialStepSize(rhs, t, y, k1, rtol, atol), maxStep)
  let lastErrFinite = true

  for (let idx = 1; idx < times.length; idx++) {
    const target = times[idx] ?? t

    while (t < target) {
      const stop = shouldStop?.(t, stats.steps)
      if (stop) return { ys, stats, t, failure: stop }

      const hMin = UNDERFLOW_ULPS * Number.EPSILON * Math.max(Math.abs(t), 1)
      if (!(h >= hMin)) {
        const failure: SolverFailure = lastErrFinite
          ? { reason: 'step-underflow', message: `step size ${h.toExponential(3)} s below minimum ${hMin.toExponential(3)} s` }
          : { reason: 'divergence', message: 'solution became non-finite' }
        return { ys, stats, t, failure }
      }

      const lands = t + h >= target
      const hStep = lands ? target - t : h

      const step = dopri5Step(rhs, t, y, k1, hStep)
      const err = errorNorm(step.error, y, step.y, rtol, atol)
      const factor = stepFactor(err)
      lastErrFinite = Number.isFinite(err)

      if (err <= 1 && allFinite(step.y) && allFinite(step.dydt)) {
        t = lands ? target : t + hStep
        y = step.y
        k1 = step.dydt
        stats.steps++
        const proposed = hStep * factor
        h = Math.min(lands ? Math.max(h, proposed) : proposed, maxStep)
      } else {
        stats.rejected++
        h = hStep * Math.min(factor, 1)
      }
    }

    ys.push(y.slice())
    onSample?.(t, y, stats.steps)
  }

  return { ys, stats, t }
}
