/**
 * Double pendulum simulation core: derivative evaluation and
 * fixed-step integration.
 *
 * Pure math.  No rendering dependencies.
 *
 *   1. Derivative evaluation (single function of state)
 *   2. Forward Euler integrator (baseline)
 *   3. RK4 integrator (4× derivative cost)
 *
 * The adaptive driver used for trajectories lives in integrate.ts.
 */

import type { PendulumState, PendulumDerivatives } from './state.ts'
import type { PendulumParameters } from './params.ts'
import { angularAccelerations } from './eom.ts'

// ─── Derivative Evaluation ──────────────────────────────────────────────────

/**
 * Compute all 4 state derivatives from the current state and parameters.
 *
 *   θ̇1 = ω1,  ω̇1 = α1(state)
 *   θ̇2 = ω2,  ω̇2 = α2(state)
 */
export function computeDerivatives(
  state: PendulumState,
  params: PendulumParameters,
): PendulumDerivatives {
  const { alpha1, alpha2 } = angularAccelerations(state, params)
  return {
    theta1Dot: state.omega1,
    omega1Dot: alpha1,
    theta2Dot: state.omega2,
    omega2Dot: alpha2,
  }
}

// ─── Forward Euler Integrator ───────────────────────────────────────────────

/**
 * Advance the state by one Forward Euler step.
 *
 *   state(t + dt) = state(t) + dt · f(state(t))
 *
 * @param state  Current state
 * @param deriv  Derivatives at current state (from computeDerivatives)
 * @param dt     Time step [s]
 */
export function forwardEuler(
  state: PendulumState,
  deriv: PendulumDerivatives,
  dt: number,
): PendulumState {
  return {
    theta1: state.theta1 + deriv.theta1Dot * dt,
    omega1: state.omega1 + deriv.omega1Dot * dt,
    theta2: state.theta2 + deriv.theta2Dot * dt,
    omega2: state.omega2 + deriv.omega2Dot * dt,
  }
}

// ─── RK4 Integrator ─────────────────────────────────────────────────────────

/**
 * Advance the state by one 4th-order Runge-Kutta step.
 *
 *   k1 = f(state)
 *   k2 = f(state + dt/2 · k1)
 *   k3 = f(state + dt/2 · k2)
 *   k4 = f(state + dt   · k3)
 *   state(t + dt) = state(t) + dt/6 · (k1 + 2k2 + 2k3 + k4)
 *
 * @param state   Current state
 * @param params  Pendulum parameters
 * @param dt      Time step [s]
 */
export function rk4Step(
  state: PendulumState,
  params: PendulumParameters,
  dt: number,
): PendulumState {
  const k1 = computeDerivatives(state, params)
  const k2 = computeDerivatives(forwardEuler(state, k1, dt / 2), params)
  const k3 = computeDerivatives(forwardEuler(state, k2, dt / 2), params)
  const k4 = computeDerivatives(forwardEuler(state, k3, dt), params)

  // Weighted average: (k1 + 2k2 + 2k3 + k4) / 6
  const avg: PendulumDerivatives = {
    theta1Dot: (k1.theta1Dot + 2 * k2.theta1Dot + 2 * k3.theta1Dot + k4.theta1Dot) / 6,
    omega1Dot: (k1.omega1Dot + 2 * k2.omega1Dot + 2 * k3.omega1Dot + k4.omega1Dot) / 6,
    theta2Dot: (k1.theta2Dot + 2 * k2.theta2Dot + 2 * k3.theta2Dot + k4.theta2Dot) / 6,
    omega2Dot: (k1.omega2Dot + 2 * k2.omega2Dot + 2 * k3.omega2Dot + k4.omega2Dot) / 6,
  }

  return forwardEuler(state, avg, dt)
}

// ─── Multi-Step Runner ──────────────────────────────────────────────────────

/**
 * Run N fixed RK4 steps and return the final state.
 *
 * For recorded trajectories use integrateTrajectory() instead.
 *
 * @param state   Initial state
 * @param params  Pendulum parameters
 * @param dt      Time step [s]
 * @param steps   Number of integration steps
 */
export function simulate(
  state: PendulumState,
  params: PendulumParameters,
  dt: number,
  steps: number,
): PendulumState {
  let current = state
  for (let i = 0; i < steps; i++) {
    current = rk4Step(current, params, dt)
  }
  return current
}
