/**
 * Derived quantities: Cartesian positions and mechanical energy.
 *
 * Every function here is a pure map of one sample (or state) plus the
 * parameters; nothing is carried between samples.
 *
 * Frame: pivot at the origin, x right, y up.
 */

import type { PendulumParameters } from './params.ts'
import type { PendulumState, Trajectory, TrajectorySample } from './state.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

export interface Point2 {
  x: number
  y: number
}

export interface DerivedFrame {
  /** Sample time [s] */
  t: number
  /** End of arm 1 [m] */
  joint: Point2
  /** End of arm 2 [m] */
  bob: Point2
  /** Total mechanical energy [J], when requested */
  energy?: number
}

export interface EnergySample {
  t: number
  kinetic: number
  potential: number
  total: number
}

export interface DerivedFrameOptions {
  /** Include total mechanical energy (default false) */
  energy?: boolean
}

// ─── Positions ───────────────────────────────────────────────────────────────

/** (x1, y1) = (L1·sinθ1, −L1·cosθ1) */
export function jointPosition(state: PendulumState, params: PendulumParameters): Point2 {
  return {
    x: params.L1 * Math.sin(state.theta1),
    y: -params.L1 * Math.cos(state.theta1),
  }
}

/** (x2, y2) = (x1 + L2·sinθ2, y1 − L2·cosθ2) */
export function bobPosition(state: PendulumState, params: PendulumParameters): Point2 {
  const joint = jointPosition(state, params)
  return {
    x: joint.x + params.L2 * Math.sin(state.theta2),
    y: joint.y - params.L2 * Math.cos(state.theta2),
  }
}

// ─── Energy ──────────────────────────────────────────────────────────────────

/**
 * Kinetic energy of both bobs.
 *
 *   T = ½·m1·L1²·ω1² + ½·m2·(L1²ω1² + L2²ω2² + 2·L1·L2·ω1·ω2·cos(θ1 − θ2))
 */
export function kineticEnergy(state: PendulumState, params: PendulumParameters): number {
  const { theta1, omega1, theta2, omega2 } = state
  const { L1, L2, m1, m2 } = params
  const v1sq = L1 * L1 * omega1 * omega1
  const v2sq = v1sq + L2 * L2 * omega2 * omega2 + 2 * L1 * L2 * omega1 * omega2 * Math.cos(theta1 - theta2)
  return 0.5 * m1 * v1sq + 0.5 * m2 * v2sq
}

/**
 * Gravitational potential energy referenced to the pivot (y = 0).
 *
 *   V = −(m1 + m2)·g·L1·cosθ1 − m2·g·L2·cosθ2
 */
export function potentialEnergy(state: PendulumState, params: PendulumParameters): number {
  const { L1, L2, m1, m2, g } = params
  return -(m1 + m2) * g * L1 * Math.cos(state.theta1) - m2 * g * L2 * Math.cos(state.theta2)
}

export function totalEnergy(state: PendulumState, params: PendulumParameters): number {
  return kineticEnergy(state, params) + potentialEnergy(state, params)
}

// ─── Per-Sample Maps ─────────────────────────────────────────────────────────

export function derivedFrame(
  sample: TrajectorySample,
  params: PendulumParameters,
  options: DerivedFrameOptions = {},
): DerivedFrame {
  const frame: DerivedFrame = {
    t: sample.t,
    joint: jointPosition(sample.state, params),
    bob: bobPosition(sample.state, params),
  }
  if (options.energy) frame.energy = totalEnergy(sample.state, params)
  return frame
}

export function derivedFrames(
  trajectory: Trajectory,
  params: PendulumParameters,
  options: DerivedFrameOptions = {},
): DerivedFrame[] {
  return trajectory.map(sample => derivedFrame(sample, params, options))
}

/**
 * Lazy energy time series; computed on demand from the stored
 * trajectory, no re-integration.
 */
export function* energySeries(
  trajectory: Trajectory,
  params: PendulumParameters,
): Generator<EnergySample, void, undefined> {
  for (const { t, state } of trajectory) {
    const kinetic = kineticEnergy(state, params)
    const potential = potentialEnergy(state, params)
    yield { t, kinetic, potential, total: kinetic + potential }
  }
}

/**
 * Largest relative deviation of total energy from its initial value,
 * max |E − E0| / |E0|.  Falls back to the absolute deviation when
 * E0 ≈ 0.  Returns 0 for an empty trajectory.
 */
export function energyDrift(trajectory: Trajectory, params: PendulumParameters): number {
  let e0: number | null = null
  let worst = 0
  for (const { total } of energySeries(trajectory, params)) {
    if (e0 === null) {
      e0 = total
      continue
    }
    worst = Math.max(worst, Math.abs(total - e0))
  }
  if (e0 === null) return 0
  return Math.abs(e0) > 1e-12 ? worst / Math.abs(e0) : worst
}
