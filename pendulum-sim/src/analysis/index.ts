/**
 * Analysis module: data hand-off to renderers and plotting.
 */

export { wrapAngle, angleSeries, velocitySeries, phaseSeries, estimateFrequency, bobSeparation, divergenceTime } from './chart-data.ts'
export type { AnglePoint, VelocityPoint, XYPoint, Arm, AngleSeriesOptions, SeparationPoint } from './chart-data.ts'
export { buildAnimationFrames, timeLabel, viewExtent } from './animation.ts'
export type { AnimationFrame, AnimationOptions, Vertex } from './animation.ts'
export { buildAnalysisChart, buildAnalysisCharts, ARM_COLORS } from './analysis-charts.ts'
export type { AnalysisView, AnalysisChart, AnalysisCharts } from './analysis-charts.ts'
