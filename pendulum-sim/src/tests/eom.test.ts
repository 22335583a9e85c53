/**
 * Equations of Motion unit tests.
 *
 * Tests the pure-math EOM functions in src/pendulum/eom.ts:
 *   - eomDenominator (lower bound 2·m1)
 *   - angularAccelerations (rest, release from horizontal, equivalent form)
 *   - normalModeFrequencies
 */

import { describe, it, expect } from 'vitest'
import {
  eomDenominator,
  angularAccelerations,
  normalModeFrequencies,
} from '../pendulum/eom.ts'
import { createParameters, DEFAULT_PARAMETERS } from '../pendulum/params.ts'
import type { PendulumParameters } from '../pendulum/params.ts'
import type { PendulumState } from '../pendulum/state.ts'
import { DomainError } from '../pendulum/errors.ts'

const g = 9.81

/**
 * The same Lagrangian solved for α1, α2 in the other common arrangement
 * (δ = θ2 − θ1, denominator (m1+m2)L1 − m2·L1·cos²δ).
 */
function referenceAccelerations(s: PendulumState, p: PendulumParameters): { alpha1: number, alpha2: number } {
  const { theta1, omega1, theta2, omega2 } = s
  const { L1, L2, m1, m2 } = p
  const delta = theta2 - theta1
  const den1 = (m1 + m2) * L1 - m2 * L1 * Math.cos(delta) * Math.cos(delta)
  const den2 = (L2 / L1) * den1
  const alpha1 = (m2 * L1 * omega1 * omega1 * Math.sin(delta) * Math.cos(delta)
    + m2 * p.g * Math.sin(theta2) * Math.cos(delta)
    + m2 * L2 * omega2 * omega2 * Math.sin(delta)
    - (m1 + m2) * p.g * Math.sin(theta1)) / den1
  const alpha2 = (-m2 * L2 * omega2 * omega2 * Math.sin(delta) * Math.cos(delta)
    + (m1 + m2) * p.g * Math.sin(theta1) * Math.cos(delta)
    - (m1 + m2) * L1 * omega1 * omega1 * Math.sin(delta)
    - (m1 + m2) * p.g * Math.sin(theta2)) / den2
  return { alpha1, alpha2 }
}

// ─── eomDenominator ──────────────────────────────────────────────────────────

describe('eomDenominator', () => {
  it('aligned arms → 2·m1', () => {
    expect(eomDenominator(0, DEFAULT_PARAMETERS)).toBeCloseTo(2, 12)
  })

  it('perpendicular arms → 2·m1 + 2·m2', () => {
    expect(eomDenominator(Math.PI / 2, DEFAULT_PARAMETERS)).toBeCloseTo(4, 12)
  })

  it('never drops below 2·m1, even for a heavy bob on a light joint', () => {
    const params = createParameters({ m1: 0.3, m2: 50 })
    for (let delta = -10; delta <= 10; delta += 0.01) {
      expect(eomDenominator(delta, params)).toBeGreaterThanOrEqual(2 * 0.3 - 1e-12)
    }
  })
})

// ─── angularAccelerations ────────────────────────────────────────────────────

describe('angularAccelerations', () => {
  it('hanging at rest → no acceleration', () => {
    const a = angularAccelerations({ theta1: 0, omega1: 0, theta2: 0, omega2: 0 }, DEFAULT_PARAMETERS)
    expect(a.alpha1).toBeCloseTo(0, 15)
    expect(a.alpha2).toBeCloseTo(0, 15)
  })

  it('both arms horizontal at rest → α1 = −g/L1, α2 = 0', () => {
    const a = angularAccelerations(
      { theta1: Math.PI / 2, omega1: 0, theta2: Math.PI / 2, omega2: 0 },
      DEFAULT_PARAMETERS,
    )
    expect(a.alpha1).toBeCloseTo(-g, 10)
    expect(a.alpha2).toBeCloseTo(0, 12)
  })

  it('balanced inverted position is an (unstable) equilibrium', () => {
    const a = angularAccelerations({ theta1: Math.PI, omega1: 0, theta2: Math.PI, omega2: 0 }, DEFAULT_PARAMETERS)
    expect(a.alpha1).toBeCloseTo(0, 12)
    expect(a.alpha2).toBeCloseTo(0, 12)
  })

  it('matches the equivalent Lagrangian arrangement for unequal arms and masses', () => {
    const params = createParameters({ L1: 1.2, L2: 0.7, m1: 2, m2: 0.5 })
    const states: PendulumState[] = [
      { theta1: 0.7, omega1: -1.3, theta2: -2.1, omega2: 0.4 },
      { theta1: 3.0, omega1: 4.0, theta2: 1.0, omega2: -6.5 },
      { theta1: -12.5, omega1: 0.1, theta2: 9.9, omega2: 2.0 },
    ]
    for (const s of states) {
      const a = angularAccelerations(s, params)
      const ref = referenceAccelerations(s, params)
      expect(a.alpha1).toBeCloseTo(ref.alpha1, 9)
      expect(a.alpha2).toBeCloseTo(ref.alpha2, 9)
    }
  })

  it('scales with gravity when at rest', () => {
    const s: PendulumState = { theta1: 0.4, omega1: 0, theta2: -0.3, omega2: 0 }
    const a1 = angularAccelerations(s, createParameters({ g: 9.81 }))
    const a2 = angularAccelerations(s, createParameters({ g: 2 * 9.81 }))
    expect(a2.alpha1).toBeCloseTo(2 * a1.alpha1, 10)
    expect(a2.alpha2).toBeCloseTo(2 * a1.alpha2, 10)
  })

  it('non-finite angle → DomainError (singular)', () => {
    expect(() => angularAccelerations(
      { theta1: Number.NaN, omega1: 0, theta2: 0, omega2: 0 },
      DEFAULT_PARAMETERS,
    )).toThrow(DomainError)
  })
})

// ─── normalModeFrequencies ───────────────────────────────────────────────────

describe('normalModeFrequencies', () => {
  it('equal arms and masses → ω² = (2 ∓ √2)·g/L, shapes ±√2', () => {
    const modes = normalModeFrequencies(DEFAULT_PARAMETERS)
    expect(modes.slow).toBeCloseTo(Math.sqrt((2 - Math.SQRT2) * g), 8)
    expect(modes.fast).toBeCloseTo(Math.sqrt((2 + Math.SQRT2) * g), 8)
    expect(modes.slowShape).toBeCloseTo(Math.SQRT2, 8)
    expect(modes.fastShape).toBeCloseTo(-Math.SQRT2, 8)
  })

  it('negligible bob mass → two independent simple pendulums', () => {
    const modes = normalModeFrequencies(createParameters({ L1: 1, L2: 0.25, m1: 1, m2: 1e-6 }))
    expect(modes.slow).toBeCloseTo(Math.sqrt(g / 1), 2)
    expect(modes.fast).toBeCloseTo(Math.sqrt(g / 0.25), 2)
  })

  it('slow mode is always below fast mode', () => {
    const modes = normalModeFrequencies(createParameters({ L1: 0.4, L2: 1.7, m1: 3, m2: 0.2 }))
    expect(modes.slow).toBeLessThan(modes.fast)
    expect(modes.slowShape).toBeGreaterThan(0)
    expect(modes.fastShape).toBeLessThan(0)
  })
})
