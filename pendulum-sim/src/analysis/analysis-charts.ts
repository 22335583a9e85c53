/**
 * Analysis charts: Chart.js configurations for the static analysis
 * figure: angles and angular velocities over time, a phase portrait per
 * arm, and the energy check.
 *
 * Only configurations are built here; the caller owns the canvas and
 * registers the Chart.js components it renders with.
 */

import type { ChartConfiguration, ChartDataset, Point } from 'chart.js'
import type { Trajectory } from '../pendulum/state.ts'
import type { PendulumParameters } from '../pendulum/params.ts'
import { energySeries } from '../pendulum/derived.ts'
import { angleSeries, velocitySeries, phaseSeries } from './chart-data.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

export type AnalysisView = 'angle' | 'velocity' | 'phase1' | 'phase2' | 'energy'

export type AnalysisChart = ChartConfiguration<'scatter', Point[]>

export type AnalysisCharts = Record<AnalysisView, AnalysisChart>

// ─── Styling ─────────────────────────────────────────────────────────────────

export const ARM_COLORS = {
  arm1: '#2196F3',
  arm2: '#FF6B6B',
  energy: '#4CAF50',
} as const

const VIEW_LABELS: Record<AnalysisView, { title: string, xLabel: string, yLabel: string }> = {
  angle:    { title: 'Angular Position Over Time', xLabel: 'Time (s)', yLabel: 'Angle (degrees)' },
  velocity: { title: 'Angular Velocity Over Time', xLabel: 'Time (s)', yLabel: 'Angular Velocity (rad/s)' },
  phase1:   { title: 'Phase Space - First Pendulum', xLabel: 'θ₁ (rad)', yLabel: 'ω₁ (rad/s)' },
  phase2:   { title: 'Phase Space - Second Pendulum', xLabel: 'θ₂ (rad)', yLabel: 'ω₂ (rad/s)' },
  energy:   { title: 'Total Mechanical Energy', xLabel: 'Time (s)', yLabel: 'Energy (J)' },
}

// ─── Chart configuration helpers ─────────────────────────────────────────────

function lineDataset(label: string, color: string, data: Point[]): ChartDataset<'scatter', Point[]> {
  return {
    label,
    data,
    showLine: true,
    borderColor: color,
    backgroundColor: color,
    borderWidth: 2,
    pointRadius: 0,
  }
}

function scatterChart(view: AnalysisView, datasets: ChartDataset<'scatter', Point[]>[]): AnalysisChart {
  const labels = VIEW_LABELS[view]
  return {
    type: 'scatter',
    data: { datasets },
    options: {
      animation: false,
      responsive: true,
      plugins: {
        title: { display: true, text: labels.title },
        legend: { display: datasets.length > 1 },
      },
      scales: {
        x: { type: 'linear', title: { display: true, text: labels.xLabel }, grid: { color: 'rgba(0,0,0,0.1)' } },
        y: { type: 'linear', title: { display: true, text: labels.yLabel }, grid: { color: 'rgba(0,0,0,0.1)' } },
      },
    },
  }
}

// ─── Builders ────────────────────────────────────────────────────────────────

/** Config for a single analysis view. */
export function buildAnalysisChart(
  view: AnalysisView,
  trajectory: Trajectory,
  params: PendulumParameters,
): AnalysisChart {
  switch (view) {
    case 'angle': {
      const pts = angleSeries(trajectory)
      return scatterChart(view, [
        lineDataset('θ₁ (First Pendulum)', ARM_COLORS.arm1, pts.map(p => ({ x: p.t, y: p.theta1 }))),
        lineDataset('θ₂ (Second Pendulum)', ARM_COLORS.arm2, pts.map(p => ({ x: p.t, y: p.theta2 }))),
      ])
    }
    case 'velocity': {
      const pts = velocitySeries(trajectory)
      return scatterChart(view, [
        lineDataset('ω₁ (First Pendulum)', ARM_COLORS.arm1, pts.map(p => ({ x: p.t, y: p.omega1 }))),
        lineDataset('ω₂ (Second Pendulum)', ARM_COLORS.arm2, pts.map(p => ({ x: p.t, y: p.omega2 }))),
      ])
    }
    case 'phase1':
      return scatterChart(view, [lineDataset('Arm 1', ARM_COLORS.arm1, phaseSeries(trajectory, 1))])
    case 'phase2':
      return scatterChart(view, [lineDataset('Arm 2', ARM_COLORS.arm2, phaseSeries(trajectory, 2))])
    case 'energy': {
      const data: Point[] = []
      for (const e of energySeries(trajectory, params)) data.push({ x: e.t, y: e.total })
      return scatterChart(view, [lineDataset('E = T + V', ARM_COLORS.energy, data)])
    }
  }
}

/** All five analysis views, keyed by view. */
export function buildAnalysisCharts(trajectory: Trajectory, params: PendulumParameters): AnalysisCharts {
  return {
    angle: buildAnalysisChart('angle', trajectory, params),
    velocity: buildAnalysisChart('velocity', trajectory, params),
    phase1: buildAnalysisChart('phase1', trajectory, params),
    phase2: buildAnalysisChart('phase2', trajectory, params),
    energy: buildAnalysisChart('energy', trajectory, params),
  }
}
