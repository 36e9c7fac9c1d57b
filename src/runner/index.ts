export {
  TrialRunner,
  ITERATION_ENV_VARS,
  type TrialRunnerOptions,
  type TrialRunnerDeps,
  type TrialRunnerEvents,
  type TrialStateChange,
  type ArtifactSource,
  type TrialRecorder,
} from './trial-runner'
