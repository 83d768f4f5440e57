export { ParallelDispatcher, SlotGate, type DispatchStats } from './dispatcher'
export { DryRunValidator, type DryRunValidatorConfig, type ValidationOutcome } from './dry-run'
export { FAILURE_THRESHOLD, FATAL_EXIT_CODE, classify, describeExitCode, isFailure } from './exit-code'
export { SyncOrchestrator, isTerminal, type SyncOrchestratorDeps } from './orchestrator'
export { allSucceeded, freezeResult, logResults, summarizeResults } from './results'
export {
  MAX_TIMER_DELAY_MS,
  RetryExecutor,
  backoffDelay,
  timerSleep,
  type RetryExecutorConfig,
  type Sleeper,
} from './retry'
export {
  EXCLUDE_DIR_FLAG,
  LIST_ONLY_FLAG,
  SpawnProcessRunner,
  buildMirrorArgs,
  type ProcessRunner,
  type SpawnProcessRunnerConfig,
} from './robocopy'
