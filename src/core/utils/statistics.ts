import type { StatisticSummary } from '../types/summary'
import tTable from './t-table.json'

export type ConfidenceLevel = 0.9 | 0.95 | 0.99

const LEVEL_KEYS: Record<ConfidenceLevel, keyof typeof tTable.normal> = {
  0.9: '0.9',
  0.95: '0.95',
  0.99: '0.99',
}

// Below this many samples nothing is rejected as an outlier
export const MIN_SAMPLES_FOR_OUTLIER_REJECTION = 4

export function mean(values: number[]): number {
  if (values.length === 0) {
    throw new Error('Cannot calculate mean of empty array')
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length
}

/**
 * Sample standard deviation (n - 1); 0 for a single value
 */
export function sampleStdDev(values: number[]): number {
  if (values.length < 2) {
    return 0
  }
  const avg = mean(values)
  const squared = values.reduce((sum, value) => sum + (value - avg) ** 2, 0)
  return Math.sqrt(squared / (values.length - 1))
}

/**
 * Quantile by linear interpolation between closest ranks
 */
export function quantile(values: number[], q: number): number {
  if (values.length === 0) {
    throw new Error('Cannot calculate quantile of empty array')
  }

  const sorted = [...values].sort((a, b) => a - b)
  const position = (sorted.length - 1) * q
  const lowerIndex = Math.floor(position)
  const upperIndex = Math.ceil(position)
  const lower = sorted[lowerIndex]
  const upper = sorted[upperIndex]

  if (lower === undefined || upper === undefined) {
    throw new Error('Invalid array index')
  }

  return lower + (upper - lower) * (position - lowerIndex)
}

export interface OutlierPartition {
  kept: number[]
  rejected: number[]
  lowerFence?: number
  upperFence?: number
}

/**
 * Tukey fences: keep values inside [Q1 - k*IQR, Q3 + k*IQR], preserving input order
 */
export function rejectOutliers(values: number[], multiplier: number): OutlierPartition {
  if (values.length < MIN_SAMPLES_FOR_OUTLIER_REJECTION) {
    return { kept: [...values], rejected: [] }
  }

  const q1 = quantile(values, 0.25)
  const q3 = quantile(values, 0.75)
  const iqr = q3 - q1
  const lowerFence = q1 - multiplier * iqr
  const upperFence = q3 + multiplier * iqr

  const kept: number[] = []
  const rejected: number[] = []
  for (const value of values) {
    if (value < lowerFence || value > upperFence) {
      rejected.push(value)
    } else {
      kept.push(value)
    }
  }

  return { kept, rejected, lowerFence, upperFence }
}

/**
 * Two-sided Student-t critical value. Between tabulated degrees of freedom the
 * next lower entry is used.
 */
export function tCritical(level: ConfidenceLevel, degreesOfFreedom: number): number {
  if (degreesOfFreedom < 1) {
    throw new Error('Degrees of freedom must be at least 1')
  }

  const key = LEVEL_KEYS[level]
  const column = tTable.critical[key]
  const lastDf = tTable.df[tTable.df.length - 1] ?? 0

  if (degreesOfFreedom > lastDf) {
    return tTable.normal[key]
  }

  let critical = column[0] ?? tTable.normal[key]
  tTable.df.forEach((df, index) => {
    const value = column[index]
    if (df <= degreesOfFreedom && value !== undefined) {
      critical = value
    }
  })
  return critical
}

export function emptyStatistics(): StatisticSummary {
  return {
    sampleCount: 0,
    mean: null,
    stddev: null,
    min: null,
    max: null,
    confidenceInterval: null,
  }
}

/**
 * Descriptive statistics plus a t-based confidence interval for the mean
 */
export function summarize(values: number[], level: ConfidenceLevel): StatisticSummary {
  if (values.length === 0) {
    return emptyStatistics()
  }

  const avg = mean(values)
  const stddev = sampleStdDev(values)
  const halfWidth =
    values.length > 1 ? tCritical(level, values.length - 1) * (stddev / Math.sqrt(values.length)) : 0

  return {
    sampleCount: values.length,
    mean: avg,
    stddev,
    min: Math.min(...values),
    max: Math.max(...values),
    confidenceInterval: {
      level,
      lower: avg - halfWidth,
      upper: avg + halfWidth,
    },
  }
}
