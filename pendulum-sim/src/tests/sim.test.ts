/**
 * Simulation core tests.
 *
 * Tests the fixed-step pipeline:
 *   - computeDerivatives (derivative evaluation)
 *   - forwardEuler (integration)
 *   - rk4Step
 *   - simulate (multi-step)
 */

import { describe, it, expect } from 'vitest'
import {
  computeDerivatives,
  forwardEuler,
  rk4Step,
  simulate,
} from '../pendulum/sim.ts'
import { DEFAULT_PARAMETERS } from '../pendulum/params.ts'
import { totalEnergy } from '../pendulum/derived.ts'
import type { PendulumState, PendulumDerivatives } from '../pendulum/state.ts'

const REST: PendulumState = { theta1: 0, omega1: 0, theta2: 0, omega2: 0 }

// ─── computeDerivatives ─────────────────────────────────────────────────────

describe('computeDerivatives', () => {
  it('angle rates equal the angular velocities', () => {
    const d = computeDerivatives({ theta1: 0.3, omega1: 1.5, theta2: -0.2, omega2: -2.5 }, DEFAULT_PARAMETERS)
    expect(d.theta1Dot).toBe(1.5)
    expect(d.theta2Dot).toBe(-2.5)
  })

  it('returns 4 finite derivatives for a violent state', () => {
    const d = computeDerivatives({ theta1: 2.9, omega1: 12, theta2: -4.0, omega2: -15 }, DEFAULT_PARAMETERS)
    for (const key of Object.keys(d) as (keyof PendulumDerivatives)[]) {
      expect(Number.isFinite(d[key])).toBe(true)
    }
  })

  it('first arm displaced right accelerates back left', () => {
    const d = computeDerivatives({ theta1: 0.2, omega1: 0, theta2: 0.2, omega2: 0 }, DEFAULT_PARAMETERS)
    expect(d.omega1Dot).toBeLessThan(0)
  })
})

// ─── forwardEuler ───────────────────────────────────────────────────────────

describe('forwardEuler', () => {
  it('adds dt · derivative to every component', () => {
    const deriv: PendulumDerivatives = { theta1Dot: 1, omega1Dot: 2, theta2Dot: 3, omega2Dot: 4 }
    const next = forwardEuler(REST, deriv, 0.5)
    expect(next).toEqual({ theta1: 0.5, omega1: 1, theta2: 1.5, omega2: 2 })
  })

  it('does not mutate its input', () => {
    const state: PendulumState = { theta1: 1, omega1: 1, theta2: 1, omega2: 1 }
    forwardEuler(state, { theta1Dot: 1, omega1Dot: 1, theta2Dot: 1, omega2Dot: 1 }, 1)
    expect(state).toEqual({ theta1: 1, omega1: 1, theta2: 1, omega2: 1 })
  })
})

// ─── rk4Step ────────────────────────────────────────────────────────────────

describe('rk4Step', () => {
  it('equilibrium stays put', () => {
    const next = rk4Step(REST, DEFAULT_PARAMETERS, 0.01)
    expect(next.theta1).toBeCloseTo(0, 15)
    expect(next.omega1).toBeCloseTo(0, 15)
    expect(next.theta2).toBeCloseTo(0, 15)
    expect(next.omega2).toBeCloseTo(0, 15)
  })

  it('released arm starts moving in the direction of gravity', () => {
    const start: PendulumState = { theta1: Math.PI / 2, omega1: 0, theta2: Math.PI / 2, omega2: 0 }
    const next = rk4Step(start, DEFAULT_PARAMETERS, 0.001)
    expect(next.omega1).toBeLessThan(0)
    expect(next.theta1).toBeLessThan(Math.PI / 2)
  })
})

// ─── simulate ───────────────────────────────────────────────────────────────

describe('simulate', () => {
  it('zero steps → same state', () => {
    const state: PendulumState = { theta1: 0.4, omega1: 0.1, theta2: -0.3, omega2: 0 }
    expect(simulate(state, DEFAULT_PARAMETERS, 0.01, 0)).toEqual(state)
  })

  it('2 seconds of chaotic motion keeps energy to 1e-4 relative at dt = 1 ms', () => {
    const state: PendulumState = { theta1: Math.PI / 2, omega1: 0, theta2: Math.PI / 2 + 0.1, omega2: 0 }
    const e0 = totalEnergy(state, DEFAULT_PARAMETERS)
    const final = simulate(state, DEFAULT_PARAMETERS, 0.001, 2000)
    const e1 = totalEnergy(final, DEFAULT_PARAMETERS)
    expect(Math.abs(e1 - e0) / Math.abs(e0)).toBeLessThan(1e-4)
  })
})
