/**
 * Simulation state types: the 4-state double pendulum vector.
 *
 * Pure types plus tuple conversions.  Angles are measured from the
 * downward vertical and are never wrapped here.
 */

// ─── 4-State Vector ──────────────────────────────────────────────────────────

export interface PendulumState {
  // Arm 1 (pivot → joint)
  theta1: number;  omega1: number
  // Arm 2 (joint → bob)
  theta2: number;  omega2: number
}

/** Ordered form: [θ1, ω1, θ2, ω2] */
export type StateTuple = readonly [theta1: number, omega1: number, theta2: number, omega2: number]

// ─── Derivative Vector ───────────────────────────────────────────────────────

/**
 * Time derivatives of the 4-state vector.
 * Returned by the derivative function, consumed by the integrators.
 */
export interface PendulumDerivatives {
  // Angular rates [rad/s]; identical to ω1, ω2
  theta1Dot: number;  theta2Dot: number
  // Angular accelerations [rad/s²]; from the Lagrangian EOM
  omega1Dot: number;  omega2Dot: number
}

// ─── Trajectory ──────────────────────────────────────────────────────────────

export interface TrajectorySample {
  /** Time since start [s] */
  readonly t: number
  readonly state: Readonly<PendulumState>
}

/** Time-ordered samples, t strictly increasing, first at t = 0. */
export type Trajectory = readonly TrajectorySample[]

/** One row of the numeric hand-off: [t, θ1, ω1, θ2, ω2] */
export type TrajectoryRow = readonly [t: number, theta1: number, omega1: number, theta2: number, omega2: number]

// ─── Conversions ─────────────────────────────────────────────────────────────

export function stateToTuple(s: PendulumState): StateTuple {
  return [s.theta1, s.omega1, s.theta2, s.omega2]
}

export function tupleToState(v: readonly number[]): PendulumState {
  if (v.length !== 4) {
    throw new RangeError(`expected 4 state components, got ${v.length}`)
  }
  const [theta1, omega1, theta2, omega2] = v
  return { theta1, omega1, theta2, omega2 }
}

export function trajectoryToTuples(trajectory: Trajectory): TrajectoryRow[] {
  return trajectory.map(({ t, state: s }) => [t, s.theta1, s.omega1, s.theta2, s.omega2] as const)
}

export function isFiniteState(s: PendulumState): boolean {
  return Number.isFinite(s.theta1) && Number.isFinite(s.omega1)
    && Number.isFinite(s.theta2) && Number.isFinite(s.omega2)
}
