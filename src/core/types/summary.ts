import type { SpecRef } from '../errors'

export interface ConfidenceInterval {
  level: number
  lower: number
  upper: number
}

export interface StatisticSummary {
  sampleCount: number
  mean: number | null
  stddev: number | null
  min: number | null
  max: number | null
  confidenceInterval: ConfidenceInterval | null
}

// Derived from a TrialSet; energy figures are joules per iteration
export interface MeasurementSummary extends StatisticSummary {
  spec: SpecRef
  passRate: number
  trialCount: number
  passCount: number
  warmupDiscarded: number
  outliersRejected: number
  // Wall-clock milliseconds per iteration over the Pass trials after warm-up
  duration: StatisticSummary
}

// A spec whose trial set was aborted, or a source that never became a spec
export interface FailedSpec {
  spec?: SpecRef
  origin?: string
  kind: string
  message: string
}

export interface HarnessRunSummary {
  startTime: Date
  endTime: Date
  duration: number
  cancelled: boolean
  summaries: MeasurementSummary[]
  failedSpecs: FailedSpec[]
}
