export { measure, loadWorkloads, resolveConfig } from './joulebench'
export type { MeasureOptions } from './api'
export { Harness, createHarness, type HarnessDeps, type HarnessEvents, type HarnessRunOptions } from './core/harness'
export * from './core'
export { SpecRegistry, parseWorkload, type LoadResult } from './registry'
export { Builder, type BuildStats } from './build'
export {
  EnvironmentRegistry,
  SourceEnvironment,
  builtInEnvironments,
  PathToolchainProbe,
  StaticToolchainProbe,
  type Environment,
  type ToolchainProbe,
} from './environments'
export {
  createProcessRunner,
  ChildProcessRunner,
  type ProcessRunner,
  type ProcessRequest,
} from './process/process-runner'
export { NullSampler, PowercapSampler, SamplerGate, createSampler, type EnergySampler } from './sampler'
export { TrialRunner } from './runner'
export { Aggregator, summarizeTrials } from './aggregation'
export { CLIReporter, JSONReporter, CSVReporter, writeReports } from './reporting'
export { logger, Logger, type LogLevel } from './logger'
