/**
 * Animation frames: everything a renderer needs to draw the pendulum
 * frame by frame: the rod polyline, a bounded trail behind the bob and
 * the time label.  Draws nothing itself.
 */

import type { Trajectory } from '../pendulum/state.ts'
import type { PendulumParameters } from '../pendulum/params.ts'
import { jointPosition, bobPosition } from '../pendulum/derived.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

/** [x, y] in meters, pivot at the origin, y up */
export type Vertex = readonly [x: number, y: number]

export interface AnimationFrame {
  index: number
  t: number
  /** Pivot → joint → bob */
  rods: readonly [Vertex, Vertex, Vertex]
  /** Most recent bob positions, oldest first, current bob last */
  trail: Vertex[]
  label: string
}

export interface AnimationOptions {
  /** Maximum bob positions kept in the trail */
  trailLength: number
}

const DEFAULT_ANIMATION: AnimationOptions = {
  trailLength: 200,
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function timeLabel(t: number): string {
  return `Time: ${t.toFixed(2)}s`
}

/**
 * Square viewport half-width that contains the whole reachable disc
 * plus a margin, e.g. 2.5 m for two 1 m arms.
 */
export function viewExtent(params: PendulumParameters, margin: number = 0.25): number {
  return (params.L1 + params.L2) * (1 + margin)
}

// ─── Frame Builder ───────────────────────────────────────────────────────────

export function buildAnimationFrames(
  trajectory: Trajectory,
  params: PendulumParameters,
  options: Partial<AnimationOptions> = {},
): AnimationFrame[] {
  const cfg = { ...DEFAULT_ANIMATION, ...options }
  const trailLength = Math.max(0, Math.floor(cfg.trailLength))
  const bobs: Vertex[] = []
  const frames: AnimationFrame[] = []

  trajectory.forEach(({ t, state }, index) => {
    const joint = jointPosition(state, params)
    const bob = bobPosition(state, params)
    const bobVertex: Vertex = [bob.x, bob.y]
    bobs.push(bobVertex)

    frames.push({
      index,
      t,
      rods: [[0, 0], [joint.x, joint.y], bobVertex],
      trail: trailLength > 0 ? bobs.slice(-trailLength) : [],
      label: timeLabel(t),
    })
  })

  return frames
}
