/**
 * Pendulum module: public API.
 *
 * Barrel export for the simulation core.  Everything in this directory
 * is rendering-independent.
 */

export type { PendulumParameters } from './params.ts'
export { createParameters, pendulumParametersSchema, DEFAULT_PARAMETERS, STANDARD_GRAVITY } from './params.ts'
export type { PendulumState, PendulumDerivatives, StateTuple, TrajectorySample, Trajectory, TrajectoryRow } from './state.ts'
export { stateToTuple, tupleToState, trajectoryToTuples, isFiniteState } from './state.ts'
export { ConfigurationError, DomainError, assertConfig, configurationErrorFromZod } from './errors.ts'
export type { DomainErrorReason } from './errors.ts'
export { eomDenominator, angularAccelerations, normalModeFrequencies } from './eom.ts'
export type { AngularAccelerations, NormalModes } from './eom.ts'
export { computeDerivatives, forwardEuler, rk4Step, simulate } from './sim.ts'
export { dopri5Step, errorNorm, stepFactor, initialStepSize, solveDopri5 } from './dopri5.ts'
export type { OdeFunction, Dopri5Options, Dopri5Result, Dopri5Step, SolverFailure, SolverStats } from './dopri5.ts'
export { integrateTrajectory, integrateWithStats, sampleTimes, validateTimeSpan, DEFAULT_RTOL, DEFAULT_ATOL, DEFAULT_RK4_SUBSTEPS } from './integrate.ts'
export type { IntegrationMethod, TimeSpan, IntegrateOptions, IntegrationResult } from './integrate.ts'
export { jointPosition, bobPosition, kineticEnergy, potentialEnergy, totalEnergy, derivedFrame, derivedFrames, energySeries, energyDrift } from './derived.ts'
export type { Point2, DerivedFrame, EnergySample, DerivedFrameOptions } from './derived.ts'
export { parseSimulationConfig, simulationConfigSchema, DEFAULT_INITIAL_STATE, DEFAULT_T_SPAN, DEFAULT_DT } from './config.ts'
export type { SimulationConfig, SimulationConfigInput } from './config.ts'
