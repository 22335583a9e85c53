/**
 * Equations of Motion: planar double pendulum.
 *
 * Pure math functions for the two angular accelerations of a pair of
 * massless rods with point bobs, pivot fixed, gravity only:
 *
 *   θ measured from the downward vertical, positive counter-clockwise
 *   (x to the right, y up, pivot at the origin)
 *
 * No rendering dependencies.
 *
 * Reference: standard two-link Lagrangian, e.g.
 *   https://www.myphysicslab.com/pendulum/double-pendulum-en.html
 */

import type { PendulumParameters } from './params.ts'
import type { PendulumState } from './state.ts'
import { DomainError } from './errors.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

/** Angular accelerations of both arms [rad/s²] */
export interface AngularAccelerations {
  alpha1: number
  alpha2: number
}

/** Linearised normal modes about the hanging equilibrium */
export interface NormalModes {
  /** In-phase mode angular frequency [rad/s] */
  slow: number
  /** Anti-phase mode angular frequency [rad/s] */
  fast: number
  /** Amplitude ratio θ2/θ1 of the slow mode (> 0) */
  slowShape: number
  /** Amplitude ratio θ2/θ1 of the fast mode (< 0) */
  fastShape: number
}

// ─── Denominator ─────────────────────────────────────────────────────────────

/**
 * Shared denominator of both accelerations (without the L1 / L2 factor).
 *
 *   D = 2·m1 + m2 − m2·cos(2δ),   δ = θ1 − θ2
 *
 * Since cos(2δ) ≤ 1, D ≥ 2·m1 > 0 for every positive mass; the
 * equations are never singular for a valid parameter set.
 *
 * @param delta  θ1 − θ2 [rad]
 */
export function eomDenominator(delta: number, params: PendulumParameters): number {
  const { m1, m2 } = params
  return 2 * m1 + m2 - m2 * Math.cos(2 * delta)
}

/** Relative slack allowed below the analytic 2·m1 bound (rounding only) */
const DENOMINATOR_SLACK = 1e-12

// ─── Angular Accelerations ───────────────────────────────────────────────────

/**
 * Closed-form accelerations from the two-link Lagrangian.
 *
 *   α1 = [ −g(2m1+m2)sinθ1 − m2·g·sin(θ1−2θ2)
 *          − 2·sinδ·m2·(ω2²L2 + ω1²L1·cosδ) ] / (L1·D)
 *
 *   α2 = [ 2·sinδ·( ω1²L1(m1+m2) + g(m1+m2)cosθ1 + ω2²L2·m2·cosδ ) ] / (L2·D)
 *
 * @throws DomainError ('singular') if D violates its 2·m1 lower bound,
 *   which only happens for non-finite angles
 */
export function angularAccelerations(
  state: PendulumState,
  params: PendulumParameters,
): AngularAccelerations {
  const { theta1, omega1, theta2, omega2 } = state
  const { L1, L2, m1, m2, g } = params

  const delta = theta1 - theta2
  const D = eomDenominator(delta, params)
  if (!(D >= 2 * m1 * (1 - DENOMINATOR_SLACK))) {
    throw new DomainError('singular', `EOM denominator ${D} below bound 2·m1 = ${2 * m1}`, Number.NaN)
  }

  const sinD = Math.sin(delta)
  const cosD = Math.cos(delta)
  const w1sq = omega1 * omega1
  const w2sq = omega2 * omega2

  const num1 =
    -g * (2 * m1 + m2) * Math.sin(theta1)
    - m2 * g * Math.sin(theta1 - 2 * theta2)
    - 2 * sinD * m2 * (w2sq * L2 + w1sq * L1 * cosD)

  const num2 =
    2 * sinD * (w1sq * L1 * (m1 + m2) + g * (m1 + m2) * Math.cos(theta1) + w2sq * L2 * m2 * cosD)

  return {
    alpha1: num1 / (L1 * D),
    alpha2: num2 / (L2 * D),
  }
}

// ─── Linearised Normal Modes ─────────────────────────────────────────────────

/**
 * Small-angle normal modes about θ1 = θ2 = 0.
 *
 *   M = | (m1+m2)L1²   m2·L1·L2 |     K = | (m1+m2)·g·L1      0     |
 *       | m2·L1·L2     m2·L2²   |         |      0         m2·g·L2  |
 *
 * ω² are the roots of det(K − ω²M) = 0:
 *
 *   a·λ² − b·λ + c = 0,  a = det M = m1·m2·L1²L2²
 *                        b = (m1+m2)·g·L1·L2·(L1 + L2)·m2
 *                        c = det K = (m1+m2)·m2·g²·L1·L2
 *
 * Mode shape from the second row: θ2/θ1 = λ·m2·L1·L2 / (m2·g·L2 − λ·m2·L2²).
 */
export function normalModeFrequencies(params: PendulumParameters): NormalModes {
  const { L1, L2, m1, m2, g } = params

  const a = m1 * m2 * L1 * L1 * L2 * L2
  const b = (m1 + m2) * m2 * g * L1 * L2 * (L1 + L2)
  const c = (m1 + m2) * m2 * g * g * L1 * L2

  const disc = Math.sqrt(b * b - 4 * a * c)
  const lambdaSlow = (b - disc) / (2 * a)
  const lambdaFast = (b + disc) / (2 * a)

  const shape = (lambda: number) => (lambda * L1) / (g - lambda * L2)

  return {
    slow: Math.sqrt(lambdaSlow),
    fast: Math.sqrt(lambdaFast),
    slowShape: shape(lambdaSlow),
    fastShape: shape(lambdaFast),
  }
}
