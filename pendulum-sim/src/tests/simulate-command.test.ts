/**
 * `simulate` command tests: argument merging, reporting and failure
 * mapping, without yargs or the filesystem.
 */

import { describe, it, expect } from 'vitest'
import {
  parseSimulateArgs,
  buildSimulationConfig,
  parseConfigText,
  runSimulation,
  formatReport,
  buildArtifact,
  exitCodeFor,
  describeFailure,
  EXIT_CONFIGURATION,
  EXIT_DOMAIN,
} from '../cli/simulate-command.ts'
import type { SimulationReport } from '../cli/simulate-command.ts'
import { CliError } from '../cli/cli-error.ts'
import { parseSimulationConfig } from '../pendulum/config.ts'
import { ConfigurationError, DomainError } from '../pendulum/errors.ts'

// ─── Arguments ──────────────────────────────────────────────────────────────

describe('parseSimulateArgs', () => {
  it('drops yargs bookkeeping and fills defaults', () => {
    const args = parseSimulateArgs({ _: ['simulate'], $0: 'pendulum-sim', 't-span': 5, tSpan: 5 })
    expect(args.tSpan).toBe(5)
    expect(args.trail).toBe(200)
    expect(args.quiet).toBe(false)
    expect(Object.keys(args)).not.toContain('t-span')
  })

  it('bad flag → ConfigurationError naming it', () => {
    try {
      parseSimulateArgs({ trail: -1 })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError)
      if (err instanceof ConfigurationError) {
        expect(err.field).toBe('trail')
        expect(err.value).toBe(-1)
      }
    }
  })
})

describe('buildSimulationConfig', () => {
  it('flags override the config file field by field', () => {
    const args = parseSimulateArgs({ L1: 2, theta2: 0.3, tSpan: 5, method: 'rk4' })
    const config = buildSimulationConfig(args, { params: { m2: 2 }, dt: 0.05, tSpan: 10 })
    expect(config.params).toEqual({ L1: 2, L2: 1, m1: 1, m2: 2, g: 9.81 })
    expect(config.initialState.theta1).toBeCloseTo(Math.PI / 2, 12)
    expect(config.initialState.theta2).toBe(0.3)
    expect(config.tSpan).toBe(5)
    expect(config.dt).toBe(0.05)
    expect(config.method).toBe('rk4')
  })

  it('no file → defaults plus flags', () => {
    const config = buildSimulationConfig(parseSimulateArgs({ rtol: 1e-6 }))
    expect(config.rtol).toBe(1e-6)
    expect(config.method).toBe('dopri5')
  })

  it('invalid merged value → ConfigurationError', () => {
    expect(() => buildSimulationConfig(parseSimulateArgs({ m1: 0 }))).toThrow('params.m1: mass must be > 0')
  })

  it('invalid file value → ConfigurationError on the file field', () => {
    expect(() => buildSimulationConfig(parseSimulateArgs({}), { dt: -1 })).toThrow(ConfigurationError)
  })
})

describe('parseConfigText', () => {
  it('parses JSON', () => {
    expect(parseConfigText('{"tSpan": 3}', 'run.json')).toEqual({ tSpan: 3 })
  })

  it('malformed JSON → CliError with the configuration exit code', () => {
    try {
      parseConfigText('{tSpan', 'run.json')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(CliError)
      if (err instanceof CliError) {
        expect(err.exitCode).toBe(EXIT_CONFIGURATION)
        expect(err.message).toMatch(/^run\.json: not valid JSON \(/)
      }
    }
  })
})

// ─── Run ────────────────────────────────────────────────────────────────────

describe('runSimulation', () => {
  const config = parseSimulationConfig({
    initialState: [0.1, 0, 0.1, 0],
    tSpan: 1,
    dt: 0.1,
    method: 'rk4',
  })

  it('integrates on the output grid and measures drift', () => {
    const report = runSimulation(config)
    expect(report.result.trajectory).toHaveLength(10)
    expect(report.result.stats.steps).toBe(90)
    expect(report.energyDrift).toBeLessThan(1e-6)
    expect(report.divergence).toBeUndefined()
  })

  it('small-angle runs stay together under a tiny perturbation', () => {
    const report = runSimulation(config, 1e-6)
    expect(report.divergence?.epsilon).toBe(1e-6)
    expect(report.divergence?.threshold).toBeCloseTo(1e-5, 15)
    expect(report.divergence?.time).toBeNull()
  })
})

// ─── Output ─────────────────────────────────────────────────────────────────

function handMadeReport(): SimulationReport {
  const config = parseSimulationConfig({ tSpan: 0.5, dt: 0.1, method: 'rk4' })
  return {
    config,
    result: {
      method: 'rk4',
      stats: { steps: 40, rejected: 0, evaluations: 160 },
      trajectory: [
        { t: 0, state: config.initialState },
        { t: 0.4, state: { theta1: 1.5, omega1: -0.25, theta2: 2, omega2: 0.125 } },
      ],
    },
    energyDrift: 0.0012346,
  }
}

describe('formatReport', () => {
  it('summary lines', () => {
    expect(formatReport(handMadeReport())).toEqual([
      'Double pendulum: 2 samples over 0.50 s (rk4)',
      '  steps: 40 accepted, 0 rejected, 160 evaluations',
      '  final (t = 0.40 s): θ1 = 1.5000 rad, ω1 = -0.2500 rad/s, θ2 = 2.0000 rad, ω2 = 0.1250 rad/s',
      '  energy drift: 0.1235 %',
    ])
  })

  it('divergence line when the runs separate', () => {
    const report = { ...handMadeReport(), divergence: { epsilon: 1e-6, threshold: 1e-5, time: 7.5 } }
    expect(formatReport(report)[4]).toBe('  divergence (Δθ2 = 1.0e-6 rad): separation > 1.0e-5 m at t = 7.50 s')
  })

  it('divergence line when they never do', () => {
    const report = { ...handMadeReport(), divergence: { epsilon: 1e-6, threshold: 1e-5, time: null } }
    expect(formatReport(report)[4]).toBe('  divergence (Δθ2 = 1.0e-6 rad): separation stayed below 1.0e-5 m')
  })
})

describe('buildArtifact', () => {
  it('samples as rows, frames with energy', () => {
    const artifact = buildArtifact(handMadeReport(), 50)
    expect(artifact.trailLength).toBe(50)
    expect(artifact.samples[1]).toEqual([0.4, 1.5, -0.25, 2, 0.125])
    expect(artifact.frames).toHaveLength(2)
    expect(typeof artifact.frames[0]?.energy).toBe('number')
  })

  it('animation frames carry the trail and the time label', () => {
    const artifact = buildArtifact(handMadeReport(), 1)
    expect(artifact.animation).toHaveLength(2)
    expect(artifact.animation[1]?.label).toBe('Time: 0.40s')
    expect(artifact.animation[1]?.trail).toEqual([artifact.animation[1]?.rods[2]])
  })

  it('trail length 0 → animation without trail', () => {
    const artifact = buildArtifact(handMadeReport(), 0)
    expect(artifact.animation.map(f => f.trail.length)).toEqual([0, 0])
  })
})

// ─── Failures ───────────────────────────────────────────────────────────────

describe('exitCodeFor / describeFailure', () => {
  const domain = new DomainError('max-steps', 'step budget exhausted', 0.25, [
    { t: 0, state: { theta1: 0, omega1: 0, theta2: 0, omega2: 0 } },
    { t: 0.2, state: { theta1: 0, omega1: 0, theta2: 0, omega2: 0 } },
  ])

  it('maps error classes to exit codes', () => {
    expect(exitCodeFor(new ConfigurationError('dt', 0, 'must be > 0'))).toBe(EXIT_CONFIGURATION)
    expect(exitCodeFor(domain)).toBe(EXIT_DOMAIN)
    expect(exitCodeFor(new CliError('usage', 4))).toBe(4)
    expect(exitCodeFor(new Error('boom'))).toBe(1)
  })

  it('configuration failure message', () => {
    expect(describeFailure(new ConfigurationError('dt', 0, 'must be > 0'))).toBe('Invalid configuration: dt: must be > 0')
  })

  it('domain failure names the reason and the last sample', () => {
    expect(describeFailure(domain)).toBe(
      'Integration failed [max-steps]: step budget exhausted (t = 0.2500 s, 2 samples). last sample at t = 0.20 s.',
    )
  })

  it('anything else → its message', () => {
    expect(describeFailure(new Error('boom'))).toBe('boom')
    expect(describeFailure('plain')).toBe('plain')
  })
})
