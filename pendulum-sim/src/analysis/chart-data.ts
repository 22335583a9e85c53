/**
 * Chart data generation: time series and phase portraits derived from
 * a trajectory, plus the diagnostics used to read them (oscillation
 * frequency, divergence of two runs).
 *
 * Angle wrapping lives here: it is a display transform only, the
 * trajectory itself is never wrapped.
 */

import type { Trajectory } from '../pendulum/state.ts'
import type { PendulumParameters } from '../pendulum/params.ts'
import { bobPosition } from '../pendulum/derived.ts'

const RAD = 180 / Math.PI

// ─── Data Points ─────────────────────────────────────────────────────────────

export interface AnglePoint {
  t: number
  theta1: number
  theta2: number
}

export interface VelocityPoint {
  t: number
  omega1: number
  omega2: number
}

export interface XYPoint {
  x: number
  y: number
}

export type Arm = 1 | 2

export interface AngleSeriesOptions {
  /** Report degrees instead of radians (default true) */
  degrees: boolean
  /** Wrap into (−π, π] / (−180°, 180°] (default false) */
  wrap: boolean
}

const DEFAULT_ANGLE_OPTIONS: AngleSeriesOptions = {
  degrees: true,
  wrap: false,
}

// ─── Angle Wrapping ──────────────────────────────────────────────────────────

/** Map any angle [rad] into (−π, π]. */
export function wrapAngle(rad: number): number {
  const twoPi = 2 * Math.PI
  const r = rad - twoPi * Math.floor((rad + Math.PI) / twoPi)
  // floor puts exactly −π at −π; the half-open range wants +π
  return r === -Math.PI ? Math.PI : r
}

// ─── Series ──────────────────────────────────────────────────────────────────

export function angleSeries(
  trajectory: Trajectory,
  options: Partial<AngleSeriesOptions> = {},
): AnglePoint[] {
  const cfg = { ...DEFAULT_ANGLE_OPTIONS, ...options }
  const convert = (a: number) => {
    const r = cfg.wrap ? wrapAngle(a) : a
    return cfg.degrees ? r * RAD : r
  }
  return trajectory.map(({ t, state }) => ({
    t,
    theta1: convert(state.theta1),
    theta2: convert(state.theta2),
  }))
}

export function velocitySeries(trajectory: Trajectory): VelocityPoint[] {
  return trajectory.map(({ t, state }) => ({ t, omega1: state.omega1, omega2: state.omega2 }))
}

/** Phase portrait (θ, ω) of one arm, angles in radians, unwrapped. */
export function phaseSeries(trajectory: Trajectory, arm: Arm): XYPoint[] {
  return trajectory.map(({ state }) =>
    arm === 1
      ? { x: state.theta1, y: state.omega1 }
      : { x: state.theta2, y: state.omega2 },
  )
}

// ─── Frequency Estimate ──────────────────────────────────────────────────────

/**
 * Angular frequency [rad/s] from the mean spacing of zero crossings.
 *
 * Crossing times are linearly interpolated between samples.  Two
 * consecutive crossings are half a period apart, so
 *
 *   ω = π · (n − 1) / (t_last − t_first)
 *
 * Returns null with fewer than two crossings.
 */
export function estimateFrequency(times: readonly number[], values: readonly number[]): number | null {
  const crossings: number[] = []
  const n = Math.min(times.length, values.length)
  for (let i = 1; i < n; i++) {
    const v0 = values[i - 1] ?? 0
    const v1 = values[i] ?? 0
    const t0 = times[i - 1] ?? 0
    const t1 = times[i] ?? 0
    if (v0 === 0 && i === 1) crossings.push(t0)
    if ((v0 < 0 && v1 >= 0) || (v0 > 0 && v1 <= 0)) {
      crossings.push(t0 + (t1 - t0) * (v0 / (v0 - v1)))
    }
  }
  if (crossings.length < 2) return null
  const first = crossings[0] ?? 0
  const last = crossings[crossings.length - 1] ?? 0
  return Math.PI * (crossings.length - 1) / (last - first)
}

// ─── Divergence of Two Runs ──────────────────────────────────────────────────

export interface SeparationPoint {
  t: number
  /** Euclidean distance between the two bob positions [m] */
  distance: number
}

/**
 * Bob-to-bob distance between two trajectories, sample by sample, over
 * their common length.  Both are expected on the same output grid.
 */
export function bobSeparation(
  a: Trajectory,
  b: Trajectory,
  params: PendulumParameters,
  paramsB: PendulumParameters = params,
): SeparationPoint[] {
  const n = Math.min(a.length, b.length)
  const out: SeparationPoint[] = []
  for (let i = 0; i < n; i++) {
    const sa = a[i]
    const sb = b[i]
    if (!sa || !sb) break
    const pa = bobPosition(sa.state, params)
    const pb = bobPosition(sb.state, paramsB)
    out.push({ t: sa.t, distance: Math.hypot(pa.x - pb.x, pa.y - pb.y) })
  }
  return out
}

/** First sample time where the bob separation exceeds `threshold` [m], or null. */
export function divergenceTime(
  a: Trajectory,
  b: Trajectory,
  params: PendulumParameters,
  threshold: number,
): number | null {
  const hit = bobSeparation(a, b, params).find(p => p.distance > threshold)
  return hit ? hit.t : null
}
