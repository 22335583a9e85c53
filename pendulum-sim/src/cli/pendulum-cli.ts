#!/usr/bin/env tsx
/**
 * pendulum-sim: headless double pendulum runs from the command line.
 *
 * Built with Yargs + Zod.  Writes results as transient JSON for an
 * external renderer; never draws anything itself.
 */

import { readFileSync, writeFileSync } from 'node:fs'
import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import {
  parseSimulateArgs,
  buildSimulationConfig,
  parseConfigText,
  runSimulation,
  formatReport,
  buildArtifact,
  exitCodeFor,
  describeFailure,
} from './simulate-command.ts'
import { buildAnalysisCharts } from '../analysis/index.ts'

const terminalWidth = typeof process.stdout.columns === 'number' ? process.stdout.columns : 120

function simulate(argv: unknown): void {
  const args = parseSimulateArgs(argv)
  const fileConfig = args.config ? parseConfigText(readFileSync(args.config, 'utf8'), args.config) : {}
  const config = buildSimulationConfig(args, fileConfig)

  const report = runSimulation(config, args.compareEpsilon)
  if (!args.quiet) {
    for (const line of formatReport(report)) console.log(line)
  }
  if (report.energyDrift > 0.01) {
    console.warn(`Energy drifted by ${(report.energyDrift * 100).toFixed(2)} %; consider tighter --rtol/--atol or a smaller --dt`)
  }

  if (args.out) {
    writeFileSync(args.out, JSON.stringify(buildArtifact(report, args.trail)))
    if (!args.quiet) console.log(`Trajectory written to '${args.out}'`)
  }
  if (args.charts) {
    writeFileSync(args.charts, JSON.stringify(buildAnalysisCharts(report.result.trajectory, config.params)))
    if (!args.quiet) console.log(`Chart configurations written to '${args.charts}'`)
  }
}

yargs(hideBin(process.argv))
  .scriptName('pendulum-sim')
  .usage('$0 <command> [options]')
  .strict()
  .demandCommand(1, 'Specify a command.')
  .command(
    'simulate',
    'Integrate a double pendulum and report energy drift, final state and optional divergence.',
    cmd => cmd
      .option('config', { type: 'string', describe: 'JSON file with params, initialState, tSpan, dt, …' })
      .option('L1', { type: 'number', describe: 'Arm 1 length [m].' })
      .option('L2', { type: 'number', describe: 'Arm 2 length [m].' })
      .option('m1', { type: 'number', describe: 'Joint mass [kg].' })
      .option('m2', { type: 'number', describe: 'Bob mass [kg].' })
      .option('g', { type: 'number', describe: 'Gravitational acceleration [m/s²].' })
      .option('theta1', { type: 'number', describe: 'Initial angle of arm 1 [rad].' })
      .option('omega1', { type: 'number', describe: 'Initial angular velocity of arm 1 [rad/s].' })
      .option('theta2', { type: 'number', describe: 'Initial angle of arm 2 [rad].' })
      .option('omega2', { type: 'number', describe: 'Initial angular velocity of arm 2 [rad/s].' })
      .option('t-span', { type: 'number', describe: 'Simulated time [s] (default 20).' })
      .option('dt', { type: 'number', describe: 'Output sampling interval [s] (default 0.02).' })
      .option('method', { type: 'string', choices: ['dopri5', 'rk4'], describe: 'Integrator.' })
      .option('rtol', { type: 'number', describe: 'Relative tolerance (dopri5).' })
      .option('atol', { type: 'number', describe: 'Absolute tolerance (dopri5).' })
      .option('max-steps', { type: 'number', describe: 'Abort after this many steps.' })
      .option('deadline-ms', { type: 'number', describe: 'Abort after this many milliseconds.' })
      .option('trail', { type: 'number', default: 200, describe: 'Bob positions kept in each animation frame trail of the output file.' })
      .option('out', { type: 'string', describe: 'Write samples, derived frames and animation frames as JSON.' })
      .option('charts', { type: 'string', describe: 'Write Chart.js analysis configurations as JSON.' })
      .option('compare-epsilon', { type: 'number', describe: 'Also run with θ2 perturbed by this much and report divergence.' })
      .option('quiet', { type: 'boolean', default: false, describe: 'Suppress the summary.' }),
    argv => {
      try {
        simulate(argv)
      } catch (err) {
        console.error(describeFailure(err))
        process.exitCode = exitCodeFor(err)
      }
    },
  )
  .wrap(Math.min(terminalWidth, 120))
  .parse()
