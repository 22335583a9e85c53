/**
 * `simulate` command: the orchestration layer between parsed CLI
 * arguments and the simulation core.
 *
 * Kept free of yargs and of the filesystem so it can be exercised
 * headlessly; pendulum-cli.ts does the wiring and the I/O.
 */

import { z } from 'zod'
import type { SimulationConfig } from '../pendulum/config.ts'
import { parseSimulationConfig } from '../pendulum/config.ts'
import type { IntegrationResult } from '../pendulum/integrate.ts'
import { integrateWithStats } from '../pendulum/integrate.ts'
import { energyDrift, derivedFrames } from '../pendulum/derived.ts'
import type { DerivedFrame } from '../pendulum/derived.ts'
import type { TrajectoryRow } from '../pendulum/state.ts'
import { trajectoryToTuples } from '../pendulum/state.ts'
import { ConfigurationError, DomainError, configurationErrorFromZod } from '../pendulum/errors.ts'
import { divergenceTime } from '../analysis/chart-data.ts'
import { buildAnimationFrames } from '../analysis/animation.ts'
import type { AnimationFrame } from '../analysis/animation.ts'
import { CliError } from './cli-error.ts'

// ─── Arguments ───────────────────────────────────────────────────────────────

export const simulateArgsSchema = z.object({
  config: z.string().optional(),
  L1: z.number().optional(),
  L2: z.number().optional(),
  m1: z.number().optional(),
  m2: z.number().optional(),
  g: z.number().optional(),
  theta1: z.number().optional(),
  omega1: z.number().optional(),
  theta2: z.number().optional(),
  omega2: z.number().optional(),
  tSpan: z.number().optional(),
  dt: z.number().optional(),
  method: z.enum(['dopri5', 'rk4']).optional(),
  rtol: z.number().optional(),
  atol: z.number().optional(),
  maxSteps: z.number().optional(),
  deadlineMs: z.number().optional(),
  trail: z.number().int().nonnegative().default(200),
  out: z.string().optional(),
  charts: z.string().optional(),
  compareEpsilon: z.number().positive().optional(),
  quiet: z.boolean().default(false),
})

export type SimulateArgs = z.infer<typeof simulateArgsSchema>

/** @throws ConfigurationError naming the offending flag */
export function parseSimulateArgs(argv: unknown): SimulateArgs {
  const result = simulateArgsSchema.safeParse(argv)
  if (!result.success) throw configurationErrorFromZod(result.error, argv)
  return result.data
}

export const EXIT_CONFIGURATION = 2
export const EXIT_DOMAIN = 3

function defined<T>(record: Record<string, T | undefined>): Record<string, T> {
  const out: Record<string, T> = {}
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) out[key] = value
  }
  return out
}

/**
 * Combine a config file (already JSON-parsed) with command-line flags.
 * Flags win field by field; the result is validated once more.
 *
 * @throws ConfigurationError naming the offending field
 */
export function buildSimulationConfig(args: SimulateArgs, fileConfig: unknown = {}): SimulationConfig {
  const base = parseSimulationConfig(fileConfig)

  return parseSimulationConfig({
    ...base,
    params: {
      ...base.params,
      ...defined({ L1: args.L1, L2: args.L2, m1: args.m1, m2: args.m2, g: args.g }),
    },
    initialState: {
      ...base.initialState,
      ...defined({ theta1: args.theta1, omega1: args.omega1, theta2: args.theta2, omega2: args.omega2 }),
    },
    ...defined({
      tSpan: args.tSpan,
      dt: args.dt,
      rtol: args.rtol,
      atol: args.atol,
      maxSteps: args.maxSteps,
      deadlineMs: args.deadlineMs,
    }),
    ...(args.method ? { method: args.method } : {}),
  })
}

/** Parse config file text; malformed JSON is a usage error. */
export function parseConfigText(text: string, source: string): unknown {
  try {
    return JSON.parse(text)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new CliError(`${source}: not valid JSON (${reason})`, EXIT_CONFIGURATION)
  }
}

// ─── Run ─────────────────────────────────────────────────────────────────────

export interface DivergenceReport {
  /** Perturbation applied to θ2 [rad] */
  epsilon: number
  /** Separation threshold, 10 × epsilon [m] */
  threshold: number
  /** First time the bobs are further apart than threshold, or null */
  time: number | null
}

export interface SimulationReport {
  config: SimulationConfig
  result: IntegrationResult
  /** max |E − E0| / |E0| */
  energyDrift: number
  divergence?: DivergenceReport
}

export function runSimulation(config: SimulationConfig, compareEpsilon?: number): SimulationReport {
  const { params, initialState, tSpan, dt, method, rtol, atol, maxSteps, deadlineMs } = config
  const options = { method, rtol, atol, maxSteps, deadlineMs }

  const result = integrateWithStats(params, initialState, { tSpan, dt }, options)
  const report: SimulationReport = {
    config,
    result,
    energyDrift: energyDrift(result.trajectory, params),
  }

  if (compareEpsilon !== undefined) {
    const perturbed = integrateWithStats(
      params,
      { ...initialState, theta2: initialState.theta2 + compareEpsilon },
      { tSpan, dt },
      options,
    )
    const threshold = 10 * compareEpsilon
    report.divergence = {
      epsilon: compareEpsilon,
      threshold,
      time: divergenceTime(result.trajectory, perturbed.trajectory, params, threshold),
    }
  }

  return report
}

// ─── Output ──────────────────────────────────────────────────────────────────

export function formatReport(report: SimulationReport): string[] {
  const { config, result, divergence } = report
  const { trajectory, stats, method } = result
  const last = trajectory[trajectory.length - 1]

  const lines = [
    `Double pendulum: ${trajectory.length} samples over ${config.tSpan.toFixed(2)} s (${method})`,
    `  steps: ${stats.steps} accepted, ${stats.rejected} rejected, ${stats.evaluations} evaluations`,
  ]
  if (last) {
    const s = last.state
    lines.push(
      `  final (t = ${last.t.toFixed(2)} s): θ1 = ${s.theta1.toFixed(4)} rad, ω1 = ${s.omega1.toFixed(4)} rad/s, `
      + `θ2 = ${s.theta2.toFixed(4)} rad, ω2 = ${s.omega2.toFixed(4)} rad/s`,
    )
  }
  lines.push(`  energy drift: ${(report.energyDrift * 100).toFixed(4)} %`)
  if (divergence) {
    const { epsilon, threshold, time } = divergence
    lines.push(time === null
      ? `  divergence (Δθ2 = ${epsilon.toExponential(1)} rad): separation stayed below ${threshold.toExponential(1)} m`
      : `  divergence (Δθ2 = ${epsilon.toExponential(1)} rad): separation > ${threshold.toExponential(1)} m at t = ${time.toFixed(2)} s`)
  }
  return lines
}

export interface SimulationArtifact {
  config: SimulationConfig
  trailLength: number
  /** [t, θ1, ω1, θ2, ω2] per sample */
  samples: TrajectoryRow[]
  frames: DerivedFrame[]
  /** Rods, bob trail and time label per sample */
  animation: AnimationFrame[]
}

/** Transient JSON hand-off for an external renderer. */
export function buildArtifact(report: SimulationReport, trailLength: number): SimulationArtifact {
  const { config, result } = report
  return {
    config,
    trailLength,
    samples: trajectoryToTuples(result.trajectory),
    frames: derivedFrames(result.trajectory, config.params, { energy: true }),
    animation: buildAnimationFrames(result.trajectory, config.params, { trailLength }),
  }
}

// ─── Failures ────────────────────────────────────────────────────────────────

export function exitCodeFor(err: unknown): number {
  if (err instanceof ConfigurationError) return EXIT_CONFIGURATION
  if (err instanceof DomainError) return EXIT_DOMAIN
  if (err instanceof CliError) return err.exitCode
  return 1
}

export function describeFailure(err: unknown): string {
  if (err instanceof ConfigurationError) {
    return `Invalid configuration: ${err.message}`
  }
  if (err instanceof DomainError) {
    const lastSample = err.partial[err.partial.length - 1]
    const reached = lastSample ? ` last sample at t = ${lastSample.t.toFixed(2)} s.` : ''
    return `Integration failed [${err.reason}]: ${err.message}.${reached}`
  }
  return err instanceof Error ? err.message : String(err)
}
